/**
 * Wilder's Smoothed Moving Average (RMA / SMMA)
 *
 * - Initialization: simple mean of the first `period` values
 * - Recursive: RMA[t] = (RMA[t-1] * (period - 1) + value[t]) / period
 *
 * Equivalent to an EMA with alpha = 1/period. Used for RSI average gain/loss.
 */

/**
 * Calculate RMA incrementally
 * @param currentValue - Current value
 * @param previousRMA - Previous RMA value
 * @param period - RMA period
 * @returns New RMA value
 */
export function rmaIncremental(
  currentValue: number,
  previousRMA: number,
  period: number
): number {
  return (previousRMA * (period - 1) + currentValue) / period;
}

/**
 * Running Wilder average that re-seeds after a gap.
 *
 * Values are pushed one at a time; `push(null)` discards the current
 * average. The first average is available once `period` consecutive values
 * have been pushed.
 */
export class RmaAccumulator {
  private readonly period: number;
  private seed: number[] = [];
  private current: number | null = null;

  constructor(period: number) {
    if (period <= 0) {
      throw new Error('RMA period must be positive');
    }
    this.period = period;
  }

  push(value: number | null): number | null {
    if (value === null) {
      this.reset();
      return null;
    }

    if (this.current !== null) {
      this.current = rmaIncremental(value, this.current, this.period);
      return this.current;
    }

    this.seed.push(value);
    if (this.seed.length === this.period) {
      this.current = this.seed.reduce((acc, v) => acc + v, 0) / this.period;
      this.seed = [];
    }
    return this.current;
  }

  reset(): void {
    this.seed = [];
    this.current = null;
  }
}
