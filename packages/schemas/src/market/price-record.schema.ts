import { z } from 'zod';

/**
 * Price field value. `null` is the missing marker: the source cell was
 * empty or not numeric. It is never substituted with 0.
 */
export const PriceValueSchema = z.number().finite().nonnegative().nullable();

/**
 * One calendar day of OHLCV data.
 * Represents a validated row produced by the ingestion stage.
 */
export const PriceRecordSchema = z.object({
  /** Trading day (unique within a table) */
  date: z.date(),
  /** Opening price */
  open: PriceValueSchema,
  /** Highest price of the day */
  high: PriceValueSchema,
  /** Lowest price of the day */
  low: PriceValueSchema,
  /** Closing price */
  close: PriceValueSchema,
  /** Close adjusted for splits and dividends */
  adjustedClose: PriceValueSchema,
  /** Traded volume */
  volume: PriceValueSchema,
});

/**
 * Price columns every dated table carries, in display order
 */
export const PRICE_COLUMNS = [
  'open',
  'high',
  'low',
  'close',
  'adjustedClose',
  'volume',
] as const;

export type PriceColumn = (typeof PRICE_COLUMNS)[number];

/**
 * CSV header -> price column. `Date` is handled separately.
 */
export const CSV_COLUMN_MAP = {
  Open: 'open',
  High: 'high',
  Low: 'low',
  Close: 'close',
  'Adj Close': 'adjustedClose',
  Volume: 'volume',
} as const satisfies Record<string, PriceColumn>;

export type CsvPriceHeader = keyof typeof CSV_COLUMN_MAP;

export const REQUIRED_CSV_COLUMNS = [
  'Date',
  'Open',
  'High',
  'Low',
  'Close',
  'Adj Close',
  'Volume',
] as const;

export type PriceValue = z.infer<typeof PriceValueSchema>;
export type PriceRecord = z.infer<typeof PriceRecordSchema>;
