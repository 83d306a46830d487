import { existsSync } from 'fs';
import { GwtError } from './errors';
import { chooseBranch, openWorkspace, type EngineDeps } from './workspace';

/**
 * `navigate`: the branch has its own worktree at `path`.
 * `switched`: no worktree held the branch, so the caller's current worktree
 * (at `path`) was switched to it in place.
 */
export type LocateResult =
  | { kind: 'navigate'; path: string }
  | { kind: 'switched'; branch: string; path: string };

export async function locateWorktree(
  deps: EngineDeps,
  branch?: string,
  opts?: { query?: string },
): Promise<LocateResult> {
  await openWorkspace(deps);
  const target = await chooseBranch(deps, branch, {
    prompt: 'move',
    query: opts?.query,
    candidates: () => deps.vcs.listLocalBranches(),
  });

  const worktrees = await deps.vcs.listWorktrees();
  const bound = worktrees.find((wt) => wt.branch === target);

  if (bound) {
    if (!existsSync(bound.path)) {
      throw new GwtError('DirectoryMissing', `worktree directory not found: ${bound.path}`);
    }
    return { kind: 'navigate', path: bound.path };
  }

  if ((await deps.vcs.hasLocalBranch(target)) || (await deps.vcs.hasRemoteBranch(target))) {
    deps.logger.info(`Worktree not found for branch '${target}'. Switching to branch instead...`);
    await deps.vcs.switchBranch(deps.cwd, target);
    return { kind: 'switched', branch: target, path: deps.cwd };
  }

  throw new GwtError('BranchNotFound', `branch '${target}' does not exist`);
}
