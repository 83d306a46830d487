/**
 * Shared git command helper. Every git invocation goes through the
 * process-wide GitMutex so repository mutations never interleave.
 */

import mutex from './git-mutex';
import { runCommand, type CommandResult } from './process';

/**
 * Execute a git command with mutex protection.
 *
 * @param args - Git command arguments (e.g., ['worktree', 'list', '--porcelain'])
 */
export async function gitCommand(
  args: string[],
  opts?: { cwd?: string },
): Promise<CommandResult> {
  return mutex.withLock(() => runCommand('git', args, { cwd: opts?.cwd }));
}
