import { describe, it, expect, vi, beforeEach } from 'vitest';
import { FzfSelector } from '../../src/lib/fzf';
import { GhReviewHost } from '../../src/lib/github';
import { runCommand } from '../../src/lib/process';

vi.mock('../../src/lib/process', () => ({
  runCommand: vi.fn(),
}));

const mockRunCommand = vi.mocked(runCommand);

function respond(exitCode: number, stdout = '', stderr = '') {
  mockRunCommand.mockResolvedValueOnce({ exitCode, stdout, stderr });
}

describe('FzfSelector', () => {
  const selector = new FzfSelector();
  const candidates = ['feature/login', 'feature/logout', 'main'];

  beforeEach(() => {
    mockRunCommand.mockReset();
  });

  it('should return the best match from fzf', async () => {
    respond(0, 'feature/login\nfeature/logout');

    const selected = await selector.select({ candidates, prompt: 'add', query: 'login' });

    expect(selected).toBe('feature/login');
    expect(mockRunCommand).toHaveBeenCalledWith('fzf', ['--filter', 'login'], {
      input: 'feature/login\nfeature/logout\nmain\n',
    });
  });

  it('should not run fzf without a query', async () => {
    expect(await selector.select({ candidates, prompt: 'add' })).toBeUndefined();
    expect(await selector.select({ candidates, prompt: 'add', query: '  ' })).toBeUndefined();
    expect(mockRunCommand).not.toHaveBeenCalled();
  });

  it('should not run fzf without candidates', async () => {
    expect(await selector.select({ candidates: [], prompt: 'move', query: 'x' })).toBeUndefined();
    expect(mockRunCommand).not.toHaveBeenCalled();
  });

  it('should return undefined when nothing matches', async () => {
    respond(1);
    expect(await selector.select({ candidates, prompt: 'add', query: 'zzz' })).toBeUndefined();
  });

  it('should treat an interrupted fzf as nothing selected', async () => {
    respond(130);
    expect(await selector.select({ candidates, prompt: 'add', query: 'main' })).toBeUndefined();
  });

  it('should report a missing fzf binary', async () => {
    respond(127, '', 'Failed to execute fzf: spawn fzf ENOENT');

    await expect(selector.select({ candidates, prompt: 'add', query: 'main' })).rejects.toMatchObject({
      kind: 'SelectorUnavailable',
      message: 'fzf is required for branch selection but was not found on PATH',
    });
  });

  it('should report other fzf failures', async () => {
    respond(2, '', 'unknown option');

    await expect(selector.select({ candidates, prompt: 'add', query: 'main' })).rejects.toMatchObject({
      kind: 'SelectorUnavailable',
      message: 'fzf failed: unknown option',
    });
  });
});

describe('GhReviewHost', () => {
  const host = new GhReviewHost();

  beforeEach(() => {
    mockRunCommand.mockReset();
  });

  it('should read the head branch of a pull request', async () => {
    respond(0, JSON.stringify({ number: 12, headRefName: 'feature/login' }));

    expect(await host.branchFor('12')).toBe('feature/login');
    expect(mockRunCommand).toHaveBeenCalledWith('gh', ['pr', 'view', '12', '--json', 'number,headRefName']);
  });

  it('should fail when gh exits non-zero', async () => {
    respond(1, '', 'no pull requests found for branch');

    await expect(host.branchFor('12')).rejects.toMatchObject({
      kind: 'ExternalLookupFailed',
      message: 'failed to fetch PR #12: no pull requests found for branch',
    });
  });

  it.each([
    ['a null head branch', JSON.stringify({ number: 12, headRefName: null })],
    ['a missing head branch', JSON.stringify({ number: 12 })],
    ['output that is not JSON', 'not json'],
  ])('should fail on %s', async (_label, stdout) => {
    respond(0, stdout);

    await expect(host.branchFor('12')).rejects.toMatchObject({
      kind: 'ExternalLookupFailed',
      message: 'could not determine branch name for PR #12',
    });
  });

  it('should check out the pull request inside the worktree', async () => {
    respond(0);

    await host.populate('12', '/r/github.com/acme/widget/feature/login');

    expect(mockRunCommand).toHaveBeenCalledWith('gh', ['pr', 'checkout', '12'], {
      cwd: '/r/github.com/acme/widget/feature/login',
    });
  });

  it('should fail when gh pr checkout fails', async () => {
    respond(1, '', 'could not checkout');

    await expect(host.populate('12', '/tmp/x')).rejects.toMatchObject({
      kind: 'ExternalLookupFailed',
      message: 'gh pr checkout 12 failed: could not checkout',
    });
  });
});
