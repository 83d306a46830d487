/**
 * Code-review host that knows which branch backs a change request.
 */
export interface ReviewHost {
  /** Head branch name of change request `id`; rejects when the id is unknown. */
  branchFor(id: string): Promise<string>;

  /** Populate the checked-out worktree at `cwd` with the change request's commits. */
  populate(id: string, cwd: string): Promise<void>;
}
