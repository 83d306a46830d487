import { gitCommand } from './git';
import { GitCommandError } from './errors';
import type { CommandResult } from './process';
import type { VcsBackend, WorktreeBinding, WorktreeInfo } from './providers/vcs-backend';

export function parseWorktreeListPorcelain(output: string): WorktreeInfo[] {
  const worktrees: WorktreeInfo[] = [];
  const blocks = output.split(/\n\s*\n/).filter((block) => block.trim());

  for (const block of blocks) {
    let path = '';
    let head = '';
    let branch: string | null = null;

    for (const line of block.split('\n')) {
      if (line.startsWith('worktree ')) {
        path = line.slice('worktree '.length);
      } else if (line.startsWith('HEAD ')) {
        head = line.slice('HEAD '.length);
      } else if (line.startsWith('branch ')) {
        branch = line.slice('branch '.length).replace(/^refs\/heads\//, '');
      } else if (line === 'detached') {
        branch = null;
      }
    }

    if (path) {
      worktrees.push({ path, branch, head, isMain: worktrees.length === 0 });
    }
  }

  return worktrees;
}

function lines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * VcsBackend over the git CLI, run from `cwd` against a single remote.
 */
export class GitBackend implements VcsBackend {
  constructor(
    private readonly cwd: string,
    readonly remote = 'origin',
  ) {}

  private run(args: string[]): Promise<CommandResult> {
    return gitCommand(args, { cwd: this.cwd });
  }

  private async runOrThrow(args: string[]): Promise<string> {
    const result = await this.run(args);
    if (result.exitCode !== 0) {
      throw new GitCommandError(args, result.exitCode, result.stderr);
    }
    return result.stdout;
  }

  private async refExists(ref: string): Promise<boolean> {
    const { exitCode } = await this.run(['show-ref', '--verify', '--quiet', ref]);
    return exitCode === 0;
  }

  async isRepository(): Promise<boolean> {
    const { exitCode } = await this.run(['rev-parse', '--git-dir']);
    return exitCode === 0;
  }

  async listWorktrees(): Promise<WorktreeInfo[]> {
    return parseWorktreeListPorcelain(await this.runOrThrow(['worktree', 'list', '--porcelain']));
  }

  async getRemoteUrl(worktreePath: string): Promise<string | undefined> {
    const { stdout, exitCode } = await this.run([
      '-C',
      worktreePath,
      'config',
      '--get',
      `remote.${this.remote}.url`,
    ]);
    return exitCode === 0 && stdout ? stdout : undefined;
  }

  async addWorktree(path: string, branch: string, binding: WorktreeBinding): Promise<void> {
    switch (binding.kind) {
      case 'existing':
        await this.runOrThrow(['worktree', 'add', path, branch]);
        return;
      case 'track':
        await this.runOrThrow(['worktree', 'add', '-b', branch, path, binding.upstream]);
        return;
      case 'new':
        await this.runOrThrow(['worktree', 'add', '-b', branch, path]);
        return;
    }
  }

  async removeWorktree(path: string): Promise<void> {
    await this.runOrThrow(['worktree', 'remove', path]);
  }

  hasLocalBranch(branch: string): Promise<boolean> {
    return this.refExists(`refs/heads/${branch}`);
  }

  hasRemoteBranch(branch: string): Promise<boolean> {
    return this.refExists(`refs/remotes/${this.remote}/${branch}`);
  }

  async listLocalBranches(): Promise<string[]> {
    const output = await this.runOrThrow(['for-each-ref', '--format=%(refname)', 'refs/heads']);
    return lines(output).map((ref) => ref.replace(/^refs\/heads\//, ''));
  }

  async listRemoteBranches(): Promise<string[]> {
    const prefix = `refs/remotes/${this.remote}/`;
    const output = await this.runOrThrow([
      'for-each-ref',
      '--format=%(refname)',
      `refs/remotes/${this.remote}`,
    ]);
    return lines(output)
      .filter((ref) => ref.startsWith(prefix))
      .map((ref) => ref.slice(prefix.length))
      .filter((name) => name !== 'HEAD');
  }

  async getUpstream(branch: string): Promise<string | undefined> {
    const { stdout, exitCode } = await this.run([
      'for-each-ref',
      '--format=%(upstream:short)',
      `refs/heads/${branch}`,
    ]);
    return exitCode === 0 && stdout ? stdout : undefined;
  }

  async listMergedBranches(into: string): Promise<string[]> {
    const output = await this.runOrThrow([
      'for-each-ref',
      '--format=%(refname)',
      '--merged',
      into,
      'refs/heads',
    ]);
    return lines(output).map((ref) => ref.replace(/^refs\/heads\//, ''));
  }

  async fetch(opts: { prune: boolean }): Promise<void> {
    await this.runOrThrow(['fetch', ...(opts.prune ? ['--prune'] : []), this.remote]);
  }

  async getRemoteDefaultBranch(): Promise<string | undefined> {
    const { stdout, exitCode } = await this.run([
      'symbolic-ref',
      '--quiet',
      `refs/remotes/${this.remote}/HEAD`,
    ]);
    if (exitCode !== 0 || !stdout) {
      return undefined;
    }
    const prefix = `refs/remotes/${this.remote}/`;
    return stdout.startsWith(prefix) ? stdout.slice(prefix.length) : stdout;
  }

  async switchBranch(cwd: string, branch: string): Promise<void> {
    await this.runOrThrow(['-C', cwd, 'switch', branch]);
  }
}
