import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { createEngine } from '../../src/lib/engine';
import { executeRemove, gwt_remove } from '../../src/tools/remove';
import { FakeVcsBackend, fakeEngineFactory, worktree } from '../helpers/fake-vcs';

vi.mock('../../src/lib/engine', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../src/lib/engine')>()),
  createEngine: vi.fn(),
}));

const mockCreateEngine = vi.mocked(createEngine);

describe('gwt_remove', () => {
  let rootDir: string;
  let mainDir: string;
  let featureDir: string;

  beforeEach(() => {
    rootDir = mkdtempSync(join(tmpdir(), 'gwt-tool-remove-'));
    mainDir = join(rootDir, 'src', 'widget');
    featureDir = join(rootDir, 'github.com', 'acme', 'widget', 'topic');
    mkdirSync(mainDir, { recursive: true });
    mkdirSync(featureDir, { recursive: true });
    const vcs = new FakeVcsBackend({
      remoteUrl: 'https://github.com/acme/widget.git',
      worktrees: [worktree(mainDir, 'main', true), worktree(featureDir, 'topic')],
    });
    mockCreateEngine.mockReset();
    mockCreateEngine.mockImplementation(fakeEngineFactory(vcs, { rootDir, remote: 'origin', debug: false }));
  });

  afterEach(() => {
    rmSync(rootDir, { recursive: true, force: true });
  });

  it('should have correct description', () => {
    expect(gwt_remove.description).toBe('Remove the managed worktree of a branch');
  });

  it('should print only progress when the caller stays put', async () => {
    const output = await executeRemove({ branch: 'topic' }, mainDir);

    expect(output).toBe(
      ["Removing worktree for branch 'topic'...", `✓ Worktree removed: ${featureDir}`].join('\n'),
    );
  });

  it('should end with the relocation path when removing the current worktree', async () => {
    const output = await executeRemove({ branch: 'topic' }, featureDir);

    expect(output.split('\n').at(-1)).toBe(mainDir);
    expect(output.split('\n')[0]).toBe(
      `Moving to default branch before removing current worktree: ${mainDir}`,
    );
  });
});
