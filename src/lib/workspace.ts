import { GwtError } from './errors';
import { formatIdentity, resolveProjectIdentity, type ProjectIdentity } from './identity';
import { basePath, worktreePath } from './paths';
import type { GwtConfig } from './config';
import type { Logger } from './log';
import type { BranchSelector } from './providers/branch-selector';
import type { ReviewHost } from './providers/review-host';
import type { VcsBackend, WorktreeBinding } from './providers/vcs-backend';

/** Everything an operation needs, passed in explicitly; nothing is read from globals. */
export interface EngineDeps {
  config: GwtConfig;
  vcs: VcsBackend;
  logger: Logger;
  /** Caller's current directory */
  cwd: string;
  selector?: BranchSelector;
  reviewHost?: ReviewHost;
}

export interface Workspace {
  identity: ProjectIdentity;
  baseDir: string;
  mainWorktree: string;
}

/**
 * Resolve identity and base directory for the repository. Every operation
 * starts here; nothing is cached between calls.
 */
export async function openWorkspace(deps: EngineDeps): Promise<Workspace> {
  if (!(await deps.vcs.isRepository())) {
    throw new GwtError('NotAGitRepository', 'not in a git repository');
  }
  const { identity, mainWorktree } = await resolveProjectIdentity(deps.vcs);
  const baseDir = basePath(deps.config.rootDir, identity);
  deps.logger.debug(`project ${formatIdentity(identity)} -> ${baseDir}`);
  return { identity, baseDir, mainWorktree };
}

export function managedPath(deps: EngineDeps, workspace: Workspace, branch: string): string {
  return worktreePath(deps.config.rootDir, workspace.identity, branch);
}

/**
 * Use the supplied branch, or ask the selector to pick one of the candidates.
 */
export async function chooseBranch(
  deps: EngineDeps,
  branch: string | undefined,
  request: { prompt: string; query?: string; candidates: () => Promise<string[]> },
): Promise<string> {
  const supplied = branch?.trim();
  if (supplied) {
    return supplied;
  }

  if (!deps.selector) {
    throw new GwtError('BranchSelectionCancelled', 'no branch selected');
  }

  const selected = await deps.selector.select({
    candidates: await request.candidates(),
    prompt: request.prompt,
    query: request.query,
  });
  if (!selected) {
    throw new GwtError('BranchSelectionCancelled', 'no branch selected');
  }
  return selected;
}

/** Local and remote branch names, remote prefix removed, de-duplicated and sorted. */
export async function listBranchCandidates(vcs: VcsBackend): Promise<string[]> {
  const local = await vcs.listLocalBranches();
  const remote = await vcs.listRemoteBranches();
  return [...new Set([...local, ...remote])].filter((name) => name !== 'HEAD').sort();
}

export async function listWorktreeBranches(vcs: VcsBackend): Promise<string[]> {
  const worktrees = await vcs.listWorktrees();
  return worktrees.flatMap((wt) => (wt.branch ? [wt.branch] : []));
}

/**
 * Reuse a local branch, else track the remote branch, else start a new one.
 */
export async function chooseBinding(vcs: VcsBackend, branch: string): Promise<WorktreeBinding> {
  if (await vcs.hasLocalBranch(branch)) {
    return { kind: 'existing' };
  }
  if (await vcs.hasRemoteBranch(branch)) {
    return { kind: 'track', upstream: `${vcs.remote}/${branch}` };
  }
  return { kind: 'new' };
}
