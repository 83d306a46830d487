import { loadConfig } from './config';
import { FzfSelector } from './fzf';
import { GhReviewHost } from './github';
import { formatIdentity, type ProjectIdentity } from './identity';
import { locateWorktree, type LocateResult } from './locator';
import { createLogger, type LogSink } from './log';
import { addWorktree } from './materializer';
import { isWithin } from './paths';
import { checkoutChangeRequest } from './pr-checkout';
import { reconcileWorktrees, type ConfirmRemoval, type ReconcileSummary } from './reconciler';
import { removeWorktree, type RemoveResult } from './retirement';
import { GitBackend } from './worktree';
import { openWorkspace, type EngineDeps } from './workspace';
import type { WorktreeInfo } from './providers/vcs-backend';

export interface ListedWorktree extends WorktreeInfo {
  /** Lives under this project's base directory */
  managed: boolean;
}

export interface WorktreeListing {
  identity: ProjectIdentity;
  project: string;
  baseDir: string;
  worktrees: ListedWorktree[];
}

/**
 * Facade over the lifecycle operations for one repository and caller directory.
 */
export class WorktreeEngine {
  constructor(private readonly deps: EngineDeps) {}

  add(branch?: string, opts?: { query?: string }): Promise<string> {
    return addWorktree(this.deps, branch, opts);
  }

  remove(branch?: string, opts?: { query?: string }): Promise<RemoveResult> {
    return removeWorktree(this.deps, branch, opts);
  }

  locate(branch?: string, opts?: { query?: string }): Promise<LocateResult> {
    return locateWorktree(this.deps, branch, opts);
  }

  prune(confirm: ConfirmRemoval): Promise<ReconcileSummary> {
    return reconcileWorktrees(this.deps, confirm);
  }

  checkoutPullRequest(id: string): Promise<string> {
    return checkoutChangeRequest(this.deps, id);
  }

  async list(): Promise<WorktreeListing> {
    const workspace = await openWorkspace(this.deps);
    const worktrees = await this.deps.vcs.listWorktrees();
    return {
      identity: workspace.identity,
      project: formatIdentity(workspace.identity),
      baseDir: workspace.baseDir,
      worktrees: worktrees.map((wt) => ({ ...wt, managed: isWithin(wt.path, workspace.baseDir) })),
    };
  }
}

/**
 * Build an engine wired to git, fzf and the GitHub CLI for `directory`.
 * Configuration is loaded and validated here, once per invocation.
 */
export async function createEngine(opts: {
  directory: string;
  sink?: LogSink;
  env?: NodeJS.ProcessEnv;
}): Promise<WorktreeEngine> {
  const config = await loadConfig({ env: opts.env });
  const logger = createLogger({ debug: config.debug, sink: opts.sink });
  return new WorktreeEngine({
    config,
    logger,
    cwd: opts.directory,
    vcs: new GitBackend(opts.directory, config.remote),
    selector: new FzfSelector(logger),
    reviewHost: new GhReviewHost(),
  });
}
