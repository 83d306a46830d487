import { tool, type ToolDefinition } from '@opencode-ai/plugin';
import { createEngine, type ListedWorktree, type WorktreeListing } from '../lib/engine';
import { createBufferSink } from '../lib/log';
import { VERSION } from '../version';

function formatWorktree(wt: ListedWorktree): string {
  const head = wt.head ? wt.head.slice(0, 7) : '-------';
  const branch = wt.branch ? `[${wt.branch}]` : '(detached HEAD)';
  const flags = [wt.isMain ? 'main' : '', wt.managed ? 'managed' : ''].filter(Boolean);
  return `${wt.path}  ${head} ${branch}${flags.length > 0 ? `  (${flags.join(', ')})` : ''}`;
}

export function formatListing(listing: WorktreeListing): string {
  return [
    'Git worktrees:',
    ...listing.worktrees.map(formatWorktree),
    '',
    `Project: ${listing.project}`,
    `Base directory: ${listing.baseDir}`,
    `gwt version ${VERSION}`,
  ].join('\n');
}

export async function executeList(directory: string): Promise<string> {
  const lines: string[] = [];
  const engine = await createEngine({ directory, sink: createBufferSink(lines) });
  const listing = await engine.list();
  return [...lines, formatListing(listing)].join('\n');
}

export const gwt_list: ToolDefinition = tool({
  description: 'List all worktrees of the repository and its managed base directory',
  args: {},
  async execute(_args, context) {
    return executeList(context.directory);
  },
});
