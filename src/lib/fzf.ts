import { GwtError } from './errors';
import { runCommand } from './process';
import type { Logger } from './log';
import type { BranchSelector, SelectionRequest } from './providers/branch-selector';

// fzf exit statuses: 0 match, 1 no match, 2 error, 130 interrupted
const FZF_NO_MATCH = 1;
const FZF_INTERRUPTED = 130;
const COMMAND_NOT_FOUND = 127;

/**
 * Selects a candidate with `fzf --filter`: fuzzy-ranks the candidates against
 * the query and takes the best hit. Runs without a terminal, so it works when
 * invoked from inside a TUI host.
 */
export class FzfSelector implements BranchSelector {
  constructor(private readonly logger?: Logger) {}

  async select(request: SelectionRequest): Promise<string | undefined> {
    const query = request.query?.trim();
    if (!query || request.candidates.length === 0) {
      return undefined;
    }

    this.logger?.debug(`Select branch to ${request.prompt}: matching "${query}" against ${request.candidates.length} candidate(s)`);

    const result = await runCommand('fzf', ['--filter', query], {
      input: `${request.candidates.join('\n')}\n`,
    });

    if (result.exitCode === COMMAND_NOT_FOUND) {
      throw new GwtError('SelectorUnavailable', 'fzf is required for branch selection but was not found on PATH');
    }
    if (result.exitCode === FZF_NO_MATCH || result.exitCode === FZF_INTERRUPTED) {
      return undefined;
    }
    if (result.exitCode !== 0) {
      throw new GwtError('SelectorUnavailable', `fzf failed: ${result.stderr || `exit ${result.exitCode}`}`);
    }

    const [best] = result.stdout.split('\n');
    return best?.trim() || undefined;
  }
}
