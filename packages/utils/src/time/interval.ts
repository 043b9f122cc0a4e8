import type { Interval } from '@candlevault/schemas';

/**
 * Convert an interval string to milliseconds
 *
 * @param interval - Interval string (e.g., '5m', '1h')
 * @returns Duration in milliseconds
 */
export function intervalToMs(interval: Interval): number {
  const unit = interval.slice(-1);
  const value = parseInt(interval.slice(0, -1), 10);

  switch (unit) {
    case 'm':
      return value * 60 * 1000;
    case 'h':
      return value * 60 * 60 * 1000;
    case 'd':
      return value * 24 * 60 * 60 * 1000;
    default:
      throw new Error(`Invalid interval: ${interval}`);
  }
}

/**
 * Base update cadence in seconds: one refresh per bar.
 */
export function baseUpdateFrequencySec(interval: Interval): number {
  return intervalToMs(interval) / 1000;
}

/**
 * Number of whole bars between two UTC millisecond instants
 */
export function barsBetween(fromMs: number, toMs: number, interval: Interval): number {
  return Math.floor((toMs - fromMs) / intervalToMs(interval));
}
