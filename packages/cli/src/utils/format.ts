import chalk from 'chalk';
import { formatBytes, formatPercent } from '@diskwatch/shared';

export { formatBytes, formatPercent };

// Usage this close below the threshold is shown as a warning
const WARNING_MARGIN = 10;

export function colorUsage(percent: number, threshold: number): string {
  const text = formatPercent(percent);
  if (percent >= threshold) return chalk.red(text);
  if (percent >= threshold - WARNING_MARGIN) return chalk.yellow(text);
  return chalk.green(text);
}

export function usageBar(percent: number, width: number = 20): string {
  const clamped = Math.min(100, Math.max(0, percent));
  const filled = Math.round((clamped / 100) * width);
  return '█'.repeat(filled) + chalk.gray('░'.repeat(width - filled));
}

/** `2026-03-10T12:00:00.000Z` → `2026-03-10 12:00:00` (UTC). */
export function formatTimestamp(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return iso;
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
