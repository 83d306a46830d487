import { tool, type ToolDefinition } from '@opencode-ai/plugin';
import { createEngine } from '../lib/engine';
import { createBufferSink } from '../lib/log';
import { formatToolOutput } from './output';

export async function executeMove(
  args: { branch?: string; query?: string },
  directory: string,
): Promise<string> {
  const lines: string[] = [];
  const engine = await createEngine({ directory, sink: createBufferSink(lines) });
  const result = await engine.locate(args.branch, { query: args.query });

  if (result.kind === 'switched') {
    lines.push(`Switched ${result.path} to branch '${result.branch}' in place`);
    return formatToolOutput(lines);
  }
  return formatToolOutput(lines, result.path);
}

export const gwt_move: ToolDefinition = tool({
  description: 'Find the worktree of a branch, or switch the current worktree to it when it has none',
  args: {
    branch: tool.schema
      .string()
      .optional()
      .describe('Branch to move to'),
    query: tool.schema
      .string()
      .optional()
      .describe('Fuzzy query used to pick a local branch when "branch" is omitted'),
  },
  async execute(args, context) {
    return executeMove(args, context.directory);
  },
});
