import { existsSync } from 'fs';
import { mkdir } from 'fs/promises';
import { GwtError } from './errors';
import {
  chooseBinding,
  chooseBranch,
  listBranchCandidates,
  managedPath,
  openWorkspace,
  type EngineDeps,
} from './workspace';

/**
 * Create a worktree for `branch` at its managed location and return the path.
 *
 * Rejects when the target directory already exists, registered or not, so a
 * stray directory is never adopted as a worktree.
 */
export async function addWorktree(
  deps: EngineDeps,
  branch?: string,
  opts?: { query?: string },
): Promise<string> {
  const workspace = await openWorkspace(deps);
  const target = await chooseBranch(deps, branch, {
    prompt: 'add',
    query: opts?.query,
    candidates: () => listBranchCandidates(deps.vcs),
  });

  const worktreeDir = managedPath(deps, workspace, target);
  if (existsSync(worktreeDir)) {
    throw new GwtError('AlreadyExists', `worktree directory already exists: ${worktreeDir}`);
  }

  await mkdir(workspace.baseDir, { recursive: true });

  const binding = await chooseBinding(deps.vcs, target);
  deps.logger.info(`Creating worktree for branch '${target}'...`);
  deps.logger.debug(`binding: ${binding.kind === 'track' ? `track ${binding.upstream}` : binding.kind}`);
  await deps.vcs.addWorktree(worktreeDir, target, binding);

  deps.logger.info(`✓ Worktree created: ${worktreeDir}`);
  return worktreeDir;
}
