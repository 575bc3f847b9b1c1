/**
 * Simple Moving Average (SMA)
 *
 * The arithmetic mean of the last N closes. Output is aligned with the
 * input: rows before `period - 1`, and rows whose window contains a
 * missing value, are `null`.
 */

import type { Series, SeriesValue } from '../table/time-series-table.js';

/**
 * Calculate SMA for a series
 * @param values - Series values (oldest first, `null` = missing)
 * @param period - Number of periods for the average
 * @returns SMA series (same length as input)
 */
export function sma(values: Series, period: number): SeriesValue[] {
  if (period <= 0) {
    throw new Error('SMA period must be positive');
  }

  const result: SeriesValue[] = new Array(values.length).fill(null);

  for (let i = period - 1; i < values.length; i++) {
    result[i] = windowMean(values, i - period + 1, i + 1);
  }

  return result;
}

/**
 * Mean of values[start..end), or null if any value is missing
 */
function windowMean(values: Series, start: number, end: number): number | null {
  let sum = 0;
  for (let i = start; i < end; i++) {
    const value = values[i];
    if (value === null) {
      return null;
    }
    sum += value;
  }
  return sum / (end - start);
}
