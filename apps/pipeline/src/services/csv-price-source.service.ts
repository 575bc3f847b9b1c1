import { readFile } from 'node:fs/promises';
import Papa from 'papaparse';
import { isValid, parse } from 'date-fns';
import {
  CSV_COLUMN_MAP,
  PriceRecordSchema,
  PriceValueSchema,
  REQUIRED_CSV_COLUMNS,
  type CsvPriceHeader,
  type PriceRecord,
  type PriceValue,
} from '@pricepipe/schemas';
import { TimeSeriesTable } from '@pricepipe/indicators';
import { PipelineError, createLogger, errorMessage } from '@pricepipe/utils';

const logger = createLogger({ name: 'pipeline:csv-source', service: 'pipeline' });

/**
 * Ingestion collaborator: produces a dated table, or `null` when the
 * configured source does not exist.
 */
export interface PriceDataSource {
  load(): Promise<TimeSeriesTable | null>;
}

/** Accepted `Date` cell formats, tried in order */
export const DATE_FORMATS = ['yyyy-MM-dd', 'MM/dd/yyyy', 'M/d/yyyy'] as const;

type CsvRow = Record<string, string | undefined>;

const PRICE_HEADERS = Object.keys(CSV_COLUMN_MAP).filter(
  (header): header is CsvPriceHeader => header in CSV_COLUMN_MAP
);

export function parseCsvDate(value: string): Date | null {
  const trimmed = value.trim();
  for (const format of DATE_FORMATS) {
    const date = parse(trimmed, format, new Date());
    if (isValid(date)) {
      return date;
    }
  }
  return null;
}

/**
 * Numeric cell, or the missing marker when the cell is empty, not a
 * number, or negative
 */
export function parsePriceCell(value: string | undefined): PriceValue {
  const trimmed = value?.trim() ?? '';
  if (trimmed === '') {
    return null;
  }
  const parsed = PriceValueSchema.safeParse(Number(trimmed));
  return parsed.success ? parsed.data : null;
}

/**
 * Parse CSV text with a Date, Open, High, Low, Close, Adj Close, Volume
 * header into a dated table sorted ascending by date.
 *
 * @throws PipelineError('InputAbsent') when required columns are missing
 * @throws PipelineError('InvalidDate') for an unparseable Date cell
 * @throws PipelineError('UnorderedDates') when a date repeats
 */
export function parsePriceCsv(text: string, source = 'csv'): TimeSeriesTable {
  const parsed = Papa.parse<CsvRow>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const fields = parsed.meta.fields ?? [];
  const missing = REQUIRED_CSV_COLUMNS.filter((column) => !fields.includes(column));
  if (missing.length > 0) {
    logger.error({ source, missing, available: fields }, 'Missing required columns');
    throw new PipelineError('InputAbsent', `Missing required columns: ${missing.join(', ')}`, {
      source,
      missing,
      available: fields,
    });
  }
  if (parsed.errors.length > 0) {
    logger.warn(
      { source, errors: parsed.errors.length, first: parsed.errors[0].message },
      'CSV rows with parse errors'
    );
  }

  let coerced = 0;
  const records = parsed.data.map((row, index): PriceRecord => {
    const rawDate = row.Date ?? '';
    const date = parseCsvDate(rawDate);
    if (!date) {
      throw new PipelineError('InvalidDate', `Could not parse date '${rawDate}' on line ${index + 2}`, {
        source,
        line: index + 2,
        value: rawDate,
      });
    }

    const values = PRICE_HEADERS.map((header): [string, PriceValue] => [
      CSV_COLUMN_MAP[header],
      parsePriceCell(row[header]),
    ]);
    coerced += values.filter(([, value]) => value === null).length;
    return PriceRecordSchema.parse({ date, ...Object.fromEntries(values) });
  });

  if (coerced > 0) {
    logger.warn({ source, cells: coerced }, 'Missing or non-numeric price/volume values');
  }

  records.sort((a, b) => a.date.getTime() - b.date.getTime());
  const table = TimeSeriesTable.fromRecords(records);
  logger.info({ source, rows: table.length() }, 'Price history loaded');
  return table;
}

/**
 * CsvPriceSource
 *
 * Reads daily price history from a CSV file.
 */
export class CsvPriceSource implements PriceDataSource {
  private readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  async load(): Promise<TimeSeriesTable | null> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (error) {
      logger.error({ path: this.path, err: errorMessage(error) }, 'Data file not readable');
      return null;
    }
    return parsePriceCsv(text, this.path);
  }
}
