import bytesLib from 'bytes';

/**
 * Format bytes to a human-readable string, e.g. `1.5 GB`.
 */
export function formatBytes(value: number): string {
  return bytesLib.format(value, { unitSeparator: ' ', decimalPlaces: 1 }) ?? '0 B';
}

/**
 * Round a ratio expressed in percent to one decimal and clamp it to 0-100.
 */
export function roundPercent(value: number): number {
  if (!Number.isFinite(value)) return 0;
  const clamped = Math.min(100, Math.max(0, value));
  return Math.round(clamped * 10) / 10;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}
