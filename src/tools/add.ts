import { tool, type ToolDefinition } from '@opencode-ai/plugin';
import { createEngine } from '../lib/engine';
import { createBufferSink } from '../lib/log';
import { formatToolOutput } from './output';

export async function executeAdd(
  args: { branch?: string; query?: string },
  directory: string,
): Promise<string> {
  const lines: string[] = [];
  const engine = await createEngine({ directory, sink: createBufferSink(lines) });
  const worktreePath = await engine.add(args.branch, { query: args.query });
  return formatToolOutput(lines, worktreePath);
}

export const gwt_add: ToolDefinition = tool({
  description: 'Create a git worktree for a branch under the managed worktree root',
  args: {
    branch: tool.schema
      .string()
      .optional()
      .describe('Branch to check out. Reuses a local branch, tracks a remote one, or creates a new branch'),
    query: tool.schema
      .string()
      .optional()
      .describe('Fuzzy query used to pick a branch when "branch" is omitted'),
  },
  async execute(args, context) {
    return executeAdd(args, context.directory);
  },
});
