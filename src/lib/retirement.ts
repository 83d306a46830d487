import { existsSync } from 'fs';
import { GwtError } from './errors';
import { isWithin, samePath } from './paths';
import {
  chooseBranch,
  listWorktreeBranches,
  managedPath,
  openWorkspace,
  type EngineDeps,
} from './workspace';
import type { WorktreeInfo } from './providers/vcs-backend';

export interface RemoveResult {
  removedPath: string;
  /** Where the caller must move, set only when it was inside the removed worktree. */
  relocateTo?: string;
}

const DEFAULT_BRANCHES = ['main', 'master'] as const;

/**
 * Worktree bound to `main`, else to `master`, whose directory still exists.
 */
export function findDefaultWorktree(worktrees: WorktreeInfo[]): WorktreeInfo | undefined {
  for (const name of DEFAULT_BRANCHES) {
    const match = worktrees.find((wt) => wt.branch === name && existsSync(wt.path));
    if (match) {
      return match;
    }
  }
  return undefined;
}

export async function removeWorktree(
  deps: EngineDeps,
  branch?: string,
  opts?: { query?: string },
): Promise<RemoveResult> {
  const workspace = await openWorkspace(deps);
  const target = await chooseBranch(deps, branch, {
    prompt: 'remove',
    query: opts?.query,
    candidates: () => listWorktreeBranches(deps.vcs),
  });

  const worktreeDir = managedPath(deps, workspace, target);
  const worktrees = await deps.vcs.listWorktrees();
  if (!worktrees.some((wt) => samePath(wt.path, worktreeDir))) {
    throw new GwtError('NotFound', `worktree not found: ${worktreeDir}`);
  }

  let relocateTo: string | undefined;
  if (isWithin(deps.cwd, worktreeDir)) {
    const fallback = findDefaultWorktree(worktrees);
    if (!fallback) {
      throw new GwtError(
        'NoDefaultBranch',
        'cannot remove current worktree: no default branch found to switch to',
      );
    }
    relocateTo = fallback.path;
    deps.logger.info(`Moving to default branch before removing current worktree: ${relocateTo}`);
  }

  deps.logger.info(`Removing worktree for branch '${target}'...`);
  await deps.vcs.removeWorktree(worktreeDir);
  deps.logger.info(`✓ Worktree removed: ${worktreeDir}`);

  return relocateTo ? { removedPath: worktreeDir, relocateTo } : { removedPath: worktreeDir };
}
