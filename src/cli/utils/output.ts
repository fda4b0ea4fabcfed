/**
 * CLI Output Formatting
 */

export function formatJson(result: unknown): string {
  return JSON.stringify(result, null, 2);
}

/**
 * Progress line for long-running commands
 */
export function formatProgress(current: number, total: number): string {
  const percent = total === 0 ? 100 : Math.round((current / total) * 100);
  return `Embedding ${current}/${total} (${percent}%)`;
}
