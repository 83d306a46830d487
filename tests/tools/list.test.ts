import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createEngine } from '../../src/lib/engine';
import { executeList, formatListing, gwt_list } from '../../src/tools/list';
import { VERSION } from '../../src/version';
import { FakeVcsBackend, fakeEngineFactory, worktree } from '../helpers/fake-vcs';

vi.mock('../../src/lib/engine', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../src/lib/engine')>()),
  createEngine: vi.fn(),
}));

const mockCreateEngine = vi.mocked(createEngine);

describe('gwt_list', () => {
  beforeEach(() => {
    const vcs = new FakeVcsBackend({
      remoteUrl: 'git@github.com:acme/widget.git',
      worktrees: [
        { path: '/src/widget', branch: 'main', head: '1234567890abcdef1234567890abcdef12345678', isMain: true },
        worktree('/r/github.com/acme/widget/feature/x', 'feature/x'),
        worktree('/tmp/scratch', null),
      ],
    });
    mockCreateEngine.mockReset();
    mockCreateEngine.mockImplementation(fakeEngineFactory(vcs, { rootDir: '/r', remote: 'origin', debug: false }));
  });

  it('should have correct description and no args', () => {
    expect(gwt_list.description).toBe('List all worktrees of the repository and its managed base directory');
    expect(Object.keys(gwt_list.args)).toEqual([]);
  });

  it('should list worktrees with project and base directory', async () => {
    const output = await executeList('/src/widget');

    expect(output.split('\n')).toEqual([
      'Git worktrees:',
      '/src/widget  1234567 [main]  (main)',
      '/r/github.com/acme/widget/feature/x  aaaaaaa [feature/x]  (managed)',
      '/tmp/scratch  aaaaaaa (detached HEAD)',
      '',
      'Project: github.com/acme/widget',
      'Base directory: /r/github.com/acme/widget',
      `gwt version ${VERSION}`,
    ]);
  });

  it('should format a worktree that is both main and managed', () => {
    const output = formatListing({
      identity: { host: 'local', owner: '', name: 'widget' },
      project: 'local/widget',
      baseDir: '/r/local/widget',
      worktrees: [{ path: '/r/local/widget', branch: 'main', head: 'b'.repeat(40), isMain: true, managed: true }],
    });

    expect(output.split('\n')[1]).toBe('/r/local/widget  bbbbbbb [main]  (main, managed)');
  });
});
