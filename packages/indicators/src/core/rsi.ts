/**
 * Relative Strength Index (RSI), Wilder's method
 *
 * - change[t] = close[t] - close[t-1]
 * - gain = max(change, 0), loss = max(-change, 0)
 * - average gain/loss: simple mean of the first `period` changes, then
 *   Wilder smoothing (see rma.ts)
 * - RSI = 100 - 100 / (1 + avgGain / avgLoss)
 *
 * Flat prices (no gains, no losses) map to 50; no losses map to 100.
 * Row t is defined only when t >= period. A missing close makes the
 * adjacent changes missing and the averages re-seed afterwards.
 */

import { RmaAccumulator } from './rma.js';
import type { Series, SeriesValue } from '../table/time-series-table.js';

export const RSI_NEUTRAL = 50;
export const RSI_MAX = 100;

/**
 * RSI from average gain and average loss
 */
export function rsiFromAverages(avgGain: number, avgLoss: number): number {
  if (avgLoss === 0) {
    return avgGain === 0 ? RSI_NEUTRAL : RSI_MAX;
  }
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

/**
 * Calculate RSI for a series of closes
 * @param closes - Close prices (oldest first, `null` = missing)
 * @param period - RSI period (default 14)
 * @returns RSI series (same length as input)
 */
export function rsi(closes: Series, period = 14): SeriesValue[] {
  if (period <= 0) {
    throw new Error('RSI period must be positive');
  }

  const result: SeriesValue[] = new Array(closes.length).fill(null);
  const gains = new RmaAccumulator(period);
  const losses = new RmaAccumulator(period);

  for (let i = 1; i < closes.length; i++) {
    const current = closes[i];
    const previous = closes[i - 1];

    if (current === null || previous === null) {
      gains.push(null);
      losses.push(null);
      continue;
    }

    const change = current - previous;
    const avgGain = gains.push(Math.max(change, 0));
    const avgLoss = losses.push(Math.max(-change, 0));

    if (avgGain !== null && avgLoss !== null) {
      result[i] = rsiFromAverages(avgGain, avgLoss);
    }
  }

  return result;
}

