import { tool, type ToolDefinition } from '@opencode-ai/plugin';
import { createEngine } from '../lib/engine';
import { createBufferSink } from '../lib/log';
import { formatToolOutput } from './output';

export async function executePrCheckout(args: { id: string }, directory: string): Promise<string> {
  const lines: string[] = [];
  const engine = await createEngine({ directory, sink: createBufferSink(lines) });
  const worktreePath = await engine.checkoutPullRequest(args.id);
  return formatToolOutput(lines, worktreePath);
}

export const gwt_pr_checkout: ToolDefinition = tool({
  description: 'Check out a GitHub pull request into its own worktree',
  args: {
    id: tool.schema
      .string()
      .describe('Pull request number'),
  },
  async execute(args, context) {
    return executePrCheckout(args, context.directory);
  },
});
