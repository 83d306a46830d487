/**
 * VcsBackend interface for the repository operations the worktree engine needs.
 *
 * Implementations own all knowledge of command output formats and hand the
 * engine structured records, so policy code never parses text.
 */

export interface WorktreeInfo {
  /** Absolute path to the worktree directory */
  path: string;
  /** Branch checked out in this worktree, or null when HEAD is detached */
  branch: string | null;
  /** HEAD commit hash */
  head: string;
  /** Whether this is the main worktree (first registry entry) */
  isMain: boolean;
}

/** How a new worktree is bound to its branch. */
export type WorktreeBinding =
  | { kind: 'existing' }
  | { kind: 'track'; upstream: string }
  | { kind: 'new' };

export interface VcsBackend {
  /** Name of the single remote the engine works against (e.g. "origin"). */
  readonly remote: string;

  isRepository(): Promise<boolean>;

  /** Registry entries in registry order; the main worktree comes first. */
  listWorktrees(): Promise<WorktreeInfo[]>;

  /** URL configured for the remote, read from the given worktree. */
  getRemoteUrl(worktreePath: string): Promise<string | undefined>;

  addWorktree(path: string, branch: string, binding: WorktreeBinding): Promise<void>;

  removeWorktree(path: string): Promise<void>;

  hasLocalBranch(branch: string): Promise<boolean>;

  hasRemoteBranch(branch: string): Promise<boolean>;

  listLocalBranches(): Promise<string[]>;

  /** Remote branch names without the `<remote>/` prefix. */
  listRemoteBranches(): Promise<string[]>;

  /** Configured upstream of a local branch (e.g. "origin/feature"), if any. */
  getUpstream(branch: string): Promise<string | undefined>;

  /** Local branches merged into `into`, a local branch or `<remote>/<branch>`. */
  listMergedBranches(into: string): Promise<string[]>;

  fetch(opts: { prune: boolean }): Promise<void>;

  /** Branch the remote advertises as its HEAD, without the remote prefix. */
  getRemoteDefaultBranch(): Promise<string | undefined>;

  /** Check out `branch` in the worktree at `cwd`. */
  switchBranch(cwd: string, branch: string): Promise<void>;
}
