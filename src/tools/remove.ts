import { tool, type ToolDefinition } from '@opencode-ai/plugin';
import { createEngine } from '../lib/engine';
import { createBufferSink } from '../lib/log';
import { formatToolOutput } from './output';

export async function executeRemove(
  args: { branch?: string; query?: string },
  directory: string,
): Promise<string> {
  const lines: string[] = [];
  const engine = await createEngine({ directory, sink: createBufferSink(lines) });
  const result = await engine.remove(args.branch, { query: args.query });
  return formatToolOutput(lines, result.relocateTo);
}

export const gwt_remove: ToolDefinition = tool({
  description: 'Remove the managed worktree of a branch',
  args: {
    branch: tool.schema
      .string()
      .optional()
      .describe('Branch whose worktree should be removed'),
    query: tool.schema
      .string()
      .optional()
      .describe('Fuzzy query used to pick a worktree branch when "branch" is omitted'),
  },
  async execute(args, context) {
    return executeRemove(args, context.directory);
  },
});
