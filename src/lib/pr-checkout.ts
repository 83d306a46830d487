import { existsSync } from 'fs';
import { mkdir } from 'fs/promises';
import { GwtError, errorMessage, isGwtError } from './errors';
import { chooseBinding, managedPath, openWorkspace, type EngineDeps } from './workspace';
import type { ReviewHost } from './providers/review-host';

const CHANGE_ID = /^[0-9]+$/;

export function validateChangeId(changeId: string | undefined): string {
  const id = changeId?.trim();
  if (!id) {
    throw new GwtError('InvalidID', 'PR ID is required');
  }
  if (!CHANGE_ID.test(id)) {
    throw new GwtError('InvalidID', 'PR ID must be a number');
  }
  return id;
}

async function lookupBranch(host: ReviewHost, id: string): Promise<string> {
  let branch: string;
  try {
    branch = (await host.branchFor(id)).trim();
  } catch (error) {
    if (isGwtError(error, 'ExternalLookupFailed')) throw error;
    throw new GwtError('ExternalLookupFailed', `failed to fetch PR #${id}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  if (!branch || branch === 'null') {
    throw new GwtError('ExternalLookupFailed', `could not determine branch name for PR #${id}`);
  }
  return branch;
}

/**
 * Check out the branch behind change request `changeId` into its managed
 * worktree and return the path. An existing worktree is returned as is.
 */
export async function checkoutChangeRequest(deps: EngineDeps, changeId: string): Promise<string> {
  const id = validateChangeId(changeId);
  const host = deps.reviewHost;
  if (!host) {
    throw new GwtError('ExternalLookupFailed', 'no code review host is configured');
  }

  const { vcs, logger } = deps;
  const workspace = await openWorkspace(deps);

  logger.info(`Fetching PR #${id} information...`);
  const branch = await lookupBranch(host, id);
  logger.info(`PR #${id} branch: ${branch}`);

  const worktreeDir = managedPath(deps, workspace, branch);
  if (existsSync(worktreeDir)) {
    logger.info(`Worktree already exists for branch '${branch}', moving to it...`);
    return worktreeDir;
  }

  await mkdir(workspace.baseDir, { recursive: true });

  logger.info('Fetching latest changes...');
  await vcs.fetch({ prune: false });

  logger.info(`Creating worktree for PR #${id} (branch: ${branch})...`);
  const binding = await chooseBinding(vcs, branch);
  await vcs.addWorktree(worktreeDir, branch, binding);

  if (binding.kind === 'new') {
    logger.info(`Branch not found in ${vcs.remote}, checking out from PR...`);
    try {
      await host.populate(id, worktreeDir);
    } catch (error) {
      if (isGwtError(error, 'ExternalLookupFailed')) throw error;
      throw new GwtError('ExternalLookupFailed', `failed to check out PR #${id}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  logger.info(`✓ PR #${id} checked out to worktree: ${worktreeDir}`);
  return worktreeDir;
}
