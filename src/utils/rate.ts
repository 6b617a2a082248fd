const RATE_UNITS = ['KB/s', 'MB/s', 'GB/s'] as const;

/**
 * Human readable transfer rate for a value in kilobytes per second.
 * formatRate(1536) === '1.5 MB/s'
 */
export function formatRate(kilobytesPerSecond: number): string {
  if (!Number.isFinite(kilobytesPerSecond) || kilobytesPerSecond <= 0) {
    return '0 KB/s';
  }

  let value = kilobytesPerSecond;
  let unitIndex = 0;
  while (value >= 1024 && unitIndex < RATE_UNITS.length - 1) {
    value /= 1024;
    unitIndex++;
  }

  const rounded = Math.round(value * 10) / 10;
  return `${rounded} ${RATE_UNITS[unitIndex] ?? 'KB/s'}`;
}
