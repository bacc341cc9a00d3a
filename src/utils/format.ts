/**
 * Formatting helpers for reports and log lines.
 */

/**
 * Format a used/total ratio as a percentage.
 * @returns "50.0%", or "n/a" when total is 0
 */
export function formatPercent(used: number, total: number): string {
  if (total <= 0) return 'n/a';
  return `${((used / total) * 100).toFixed(1)}%`;
}

/**
 * Format a utilisation metric.
 * @returns e.g. "Super Spines: 2/4 (50.0%)"
 */
export function formatUtilization(label: string, used: number, total: number): string {
  return `${label}: ${used}/${total} (${formatPercent(used, total)})`;
}

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}
