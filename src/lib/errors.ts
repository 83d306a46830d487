/**
 * Error kinds surfaced by the worktree engine.
 *
 * Every failure carries a machine-readable `kind` so callers can map it to
 * an exit status or a user-facing message without matching on text.
 */

export type GwtErrorKind =
  | 'ConfigError'
  | 'NotAGitRepository'
  | 'AlreadyExists'
  | 'NotFound'
  | 'BranchNotFound'
  | 'DirectoryMissing'
  | 'NoDefaultBranch'
  | 'BranchSelectionCancelled'
  | 'SelectorUnavailable'
  | 'InvalidID'
  | 'ExternalLookupFailed'
  | 'PartialBatchFailure'
  | 'GitCommandFailed';

export class GwtError extends Error {
  readonly kind: GwtErrorKind;

  constructor(kind: GwtErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GwtError';
    this.kind = kind;
  }
}

export class GitCommandError extends GwtError {
  readonly args: string[];
  readonly exitCode: number;
  readonly stderr: string;

  constructor(args: string[], exitCode: number, stderr: string) {
    super(
      'GitCommandFailed',
      `git ${args.join(' ')} failed (exit ${exitCode})${stderr ? `: ${stderr}` : ''}`,
    );
    this.name = 'GitCommandError';
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export interface BatchItemFailure {
  branch: string;
  message: string;
}

/**
 * Reported, never thrown, by the reconciler when some removals in a batch fail.
 */
export class PartialBatchFailure extends GwtError {
  readonly removed: number;
  readonly failures: BatchItemFailure[];

  constructor(removed: number, failures: BatchItemFailure[]) {
    super(
      'PartialBatchFailure',
      `${failures.length} of ${removed + failures.length} worktree removal(s) failed: ${failures
        .map((f) => f.branch)
        .join(', ')}`,
    );
    this.name = 'PartialBatchFailure';
    this.removed = removed;
    this.failures = failures;
  }

  get failed(): number {
    return this.failures.length;
  }
}

export function isGwtError(error: unknown, kind?: GwtErrorKind): error is GwtError {
  if (!(error instanceof GwtError)) {
    return false;
  }
  return kind === undefined || error.kind === kind;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
