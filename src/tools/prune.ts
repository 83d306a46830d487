import { tool, type ToolDefinition } from '@opencode-ai/plugin';
import { createEngine } from '../lib/engine';
import { createBufferSink } from '../lib/log';
import type { ReconcileSummary } from '../lib/reconciler';

export function formatPruneSummary(lines: string[], summary: ReconcileSummary): string {
  const output = [...lines];

  if (summary.candidates.length > 0 && !summary.confirmed) {
    output.push(
      '',
      'The following worktrees would be removed:',
      ...summary.candidates.map((c) => `  - ${c.branch}`),
      '',
      'Run gwt_prune with confirm=true to remove them.',
    );
  }

  if (summary.failure) {
    output.push(`Failures: ${summary.failure.message}`);
  }

  return output.join('\n');
}

export async function executePrune(args: { confirm?: boolean }, directory: string): Promise<string> {
  const lines: string[] = [];
  const engine = await createEngine({ directory, sink: createBufferSink(lines) });
  const summary = await engine.prune(() => args.confirm === true);
  return formatPruneSummary(lines, summary);
}

export const gwt_prune: ToolDefinition = tool({
  description:
    'Fetch with --prune and remove worktrees whose branches are merged into the default branch or whose remote branch was deleted',
  args: {
    confirm: tool.schema
      .boolean()
      .optional()
      .describe('Actually remove the orphaned worktrees. Without it only the candidates are listed'),
  },
  async execute(args, context) {
    return executePrune(args, context.directory);
  },
});
