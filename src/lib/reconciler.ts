import { existsSync } from 'fs';
import { GwtError, PartialBatchFailure, errorMessage, type BatchItemFailure } from './errors';
import { managedPath, openWorkspace, type EngineDeps } from './workspace';
import type { VcsBackend, WorktreeInfo } from './providers/vcs-backend';

export type OrphanReason = 'merged' | 'upstream-gone';

export interface OrphanCandidate {
  branch: string;
  /** Managed location the removal targets */
  path: string;
  reason: OrphanReason;
}

export interface ReconcileSummary {
  defaultBranch: string;
  candidates: OrphanCandidate[];
  /** Whether removal went ahead (false when declined or nothing to remove) */
  confirmed: boolean;
  removed: number;
  /** Candidates whose managed directory was absent */
  skipped: string[];
  /** Present when at least one removal failed; reported, never thrown */
  failure?: PartialBatchFailure;
}

export type ConfirmRemoval = (candidates: OrphanCandidate[]) => boolean | Promise<boolean>;

const ALWAYS_KEPT = new Set(['main', 'master']);

/**
 * Local `main`, else local `master`, else whatever the remote advertises as HEAD.
 */
export async function resolveDefaultBranch(vcs: VcsBackend): Promise<string> {
  if (await vcs.hasLocalBranch('main')) return 'main';
  if (await vcs.hasLocalBranch('master')) return 'master';

  const advertised = await vcs.getRemoteDefaultBranch();
  if (advertised) return advertised;

  throw new GwtError('NoDefaultBranch', 'cannot determine default branch');
}

/**
 * Classify worktree branches. A branch is an orphan when it is merged into the
 * default branch, or when its remote counterpart is gone and it had an
 * upstream configured. Either condition suffices; local-only branches that
 * never had an upstream are kept.
 */
export async function findOrphanBranches(
  vcs: VcsBackend,
  defaultBranch: string,
  worktrees: WorktreeInfo[],
): Promise<Array<{ branch: string; reason: OrphanReason }>> {
  // a default known only from the remote has no local ref to merge-check against
  const mergeTarget = (await vcs.hasLocalBranch(defaultBranch))
    ? defaultBranch
    : `${vcs.remote}/${defaultBranch}`;
  const merged = new Set(await vcs.listMergedBranches(mergeTarget));
  const seen = new Set<string>();
  const orphans: Array<{ branch: string; reason: OrphanReason }> = [];

  for (const wt of worktrees) {
    const branch = wt.branch;
    if (!branch || seen.has(branch)) continue;
    seen.add(branch);

    if (branch === defaultBranch || ALWAYS_KEPT.has(branch)) continue;

    if (merged.has(branch)) {
      orphans.push({ branch, reason: 'merged' });
      continue;
    }

    if (!(await vcs.hasRemoteBranch(branch)) && (await vcs.getUpstream(branch))) {
      orphans.push({ branch, reason: 'upstream-gone' });
    }
  }

  return orphans;
}

function describeReason(reason: OrphanReason, defaultBranch: string): string {
  return reason === 'merged' ? `merged into ${defaultBranch}` : 'remote branch deleted';
}

/**
 * Sync with the remote, find orphaned worktrees, and remove them once
 * `confirm` agrees. One failing removal does not stop the rest of the batch.
 */
export async function reconcileWorktrees(
  deps: EngineDeps,
  confirm: ConfirmRemoval,
): Promise<ReconcileSummary> {
  const { vcs, logger } = deps;
  const workspace = await openWorkspace(deps);

  logger.info('Fetching remote changes and pruning...');
  await vcs.fetch({ prune: true });

  const defaultBranch = await resolveDefaultBranch(vcs);
  logger.debug(`default branch: ${defaultBranch}`);

  const worktrees = await vcs.listWorktrees();
  const candidates = (await findOrphanBranches(vcs, defaultBranch, worktrees)).map(
    ({ branch, reason }): OrphanCandidate => ({
      branch,
      reason,
      path: managedPath(deps, workspace, branch),
    }),
  );

  const summary: ReconcileSummary = {
    defaultBranch,
    candidates,
    confirmed: false,
    removed: 0,
    skipped: [],
  };

  if (candidates.length === 0) {
    logger.info('✓ No orphaned worktrees found');
    return summary;
  }

  for (const candidate of candidates) {
    logger.info(`Found orphaned worktree: ${candidate.branch} (${describeReason(candidate.reason, defaultBranch)})`);
  }

  if (!(await confirm(candidates))) {
    logger.info('Cancelled');
    return summary;
  }
  summary.confirmed = true;

  const failures: BatchItemFailure[] = [];
  for (const candidate of candidates) {
    if (!existsSync(candidate.path)) {
      logger.debug(`skipping ${candidate.branch}: ${candidate.path} does not exist`);
      summary.skipped.push(candidate.branch);
      continue;
    }

    logger.info(`Removing worktree: ${candidate.branch}`);
    try {
      await vcs.removeWorktree(candidate.path);
      summary.removed++;
    } catch (error) {
      logger.warn(`Failed to remove worktree: ${candidate.branch}: ${errorMessage(error)}`);
      failures.push({ branch: candidate.branch, message: errorMessage(error) });
    }
  }

  if (failures.length > 0) {
    summary.failure = new PartialBatchFailure(summary.removed, failures);
  }

  logger.info(`✓ Removed ${summary.removed} worktree(s)`);
  return summary;
}
