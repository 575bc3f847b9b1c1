/**
 * Indicator Engine
 *
 * Appends indicator columns computed over `close` to a Time-Series Table.
 * A table shorter than an indicator's minimum row count still gets the
 * column, filled with the missing marker.
 */

import {
  IndicatorSpecSchema,
  indicatorSpec,
  resolveMinRows,
  RSI_DEFAULT_WINDOW,
  type IndicatorKind,
  type IndicatorSpec,
} from '@pricepipe/schemas';
import { createLogger, PipelineError } from '@pricepipe/utils';
import { sma } from '../core/sma.js';
import { rsi } from '../core/rsi.js';
import type { Series, SeriesValue, TimeSeriesTable } from '../table/time-series-table.js';

const logger = createLogger({ name: 'indicators:engine', service: 'indicators' });

/** Column every indicator is computed from */
export const SOURCE_COLUMN = 'close';

type Calculator = (closes: Series, window: number) => SeriesValue[];

const CALCULATORS: Record<IndicatorKind, Calculator> = {
  sma,
  rsi,
};

export interface IndicatorRunResult {
  /** The input table, with one new column per spec */
  table: TimeSeriesTable;
  /** Columns computed from sufficient history */
  computed: string[];
  /** Columns filled with the missing marker (table shorter than minRows) */
  insufficient: string[];
}

/**
 * Default indicator set: SMA for each period, then RSI
 */
export function defaultIndicatorSpecs(
  smaPeriods: readonly number[] = [5, 20],
  rsiPeriod: number = RSI_DEFAULT_WINDOW,
  minRows: Readonly<Record<string, number>> = {}
): IndicatorSpec[] {
  const specs = [
    ...smaPeriods.map((period) => indicatorSpec('sma', period)),
    indicatorSpec('rsi', rsiPeriod),
  ];
  return specs.map((spec) =>
    minRows[spec.name] === undefined ? spec : { ...spec, minRows: minRows[spec.name] }
  );
}

/**
 * Compute every indicator in `specs` and append it to `table`.
 *
 * Validation happens before any column is appended, so a failure never
 * leaves a partial column set behind.
 *
 * @throws PipelineError('MissingRequiredColumn') if the table has no `close` column
 * @throws PipelineError('DuplicateColumn') if a spec name repeats or already exists
 */
export function computeIndicators(
  table: TimeSeriesTable,
  specs: readonly IndicatorSpec[]
): IndicatorRunResult {
  if (!table.hasColumn(SOURCE_COLUMN)) {
    logger.error({ columns: table.columnNames() }, 'Table has no close column');
    throw new PipelineError(
      'MissingRequiredColumn',
      `Table must contain a '${SOURCE_COLUMN}' column`,
      { available: table.columnNames() }
    );
  }

  const seen = new Set<string>();
  for (const spec of specs) {
    IndicatorSpecSchema.parse(spec);
    if (seen.has(spec.name) || table.hasColumn(spec.name)) {
      throw new PipelineError('DuplicateColumn', `Column '${spec.name}' already exists`, {
        column: spec.name,
      });
    }
    seen.add(spec.name);
  }

  const closes = table.column(SOURCE_COLUMN);
  const rows = table.length();
  const columns: Array<{ name: string; values: SeriesValue[] }> = [];
  const computed: string[] = [];
  const insufficient: string[] = [];

  for (const spec of specs) {
    const minRows = resolveMinRows(spec);

    if (rows < minRows) {
      logger.warn(
        { code: 'InsufficientHistory', indicator: spec.name, rows, minRows },
        'Not enough rows for indicator, filling with missing values'
      );
      columns.push({ name: spec.name, values: new Array(rows).fill(null) });
      insufficient.push(spec.name);
      continue;
    }

    columns.push({ name: spec.name, values: CALCULATORS[spec.kind](closes, spec.window) });
    computed.push(spec.name);
  }

  for (const { name, values } of columns) {
    table.addColumn(name, values);
  }

  logger.debug({ rows, computed, insufficient }, 'Indicators calculated');

  return { table, computed, insufficient };
}
