/**
 * Tool output: progress lines, then the path the caller should move to as
 * the final line when there is one.
 */
export function formatToolOutput(lines: string[], relocateTo?: string): string {
  return (relocateTo ? [...lines, relocateTo] : lines).join('\n');
}
