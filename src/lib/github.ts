import { GwtError } from './errors';
import { runCommand } from './process';
import { PullRequestViewSchema } from './schemas';
import type { ReviewHost } from './providers/review-host';

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * ReviewHost backed by the GitHub CLI.
 */
export class GhReviewHost implements ReviewHost {
  async branchFor(id: string): Promise<string> {
    const result = await runCommand('gh', ['pr', 'view', id, '--json', 'number,headRefName']);
    if (result.exitCode !== 0) {
      throw new GwtError('ExternalLookupFailed', `failed to fetch PR #${id}: ${result.stderr || result.stdout}`);
    }

    const parsed = PullRequestViewSchema.safeParse(parseJson(result.stdout));
    const branch = parsed.success ? parsed.data.headRefName?.trim() : undefined;
    if (!branch || branch === 'null') {
      throw new GwtError('ExternalLookupFailed', `could not determine branch name for PR #${id}`);
    }
    return branch;
  }

  async populate(id: string, cwd: string): Promise<void> {
    const result = await runCommand('gh', ['pr', 'checkout', id], { cwd });
    if (result.exitCode !== 0) {
      throw new GwtError('ExternalLookupFailed', `gh pr checkout ${id} failed: ${result.stderr || result.stdout}`);
    }
  }
}
