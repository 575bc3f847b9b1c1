/**
 * @pricepipe/indicators
 *
 * Time-series table and technical indicators (SMA, RSI) for daily price history.
 */

// Data model
export {
  TimeSeriesTable,
  type Series,
  type SeriesValue,
  type RowLabel,
} from './table/time-series-table.js';

// Core functions
export { sma } from './core/sma.js';
export { rmaIncremental, RmaAccumulator } from './core/rma.js';
export { rsi, rsiFromAverages, RSI_NEUTRAL, RSI_MAX } from './core/rsi.js';

// Engine
export {
  computeIndicators,
  defaultIndicatorSpecs,
  SOURCE_COLUMN,
  type IndicatorRunResult,
} from './engine/indicator-engine.js';
