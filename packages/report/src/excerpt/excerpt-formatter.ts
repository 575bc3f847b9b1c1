import { format } from 'date-fns';
import { PRICE_COLUMNS, type ExcerptSelection } from '@pricepipe/schemas';
import { SOURCE_COLUMN, type RowLabel, type SeriesValue, type TimeSeriesTable } from '@pricepipe/indicators';
import { PipelineError, createLogger } from '@pricepipe/utils';

const logger = createLogger({ name: 'report:excerpt', service: 'report' });

/** Rendered in place of the missing marker */
export const MISSING_CELL = 'n/a';

const PRICE_COLUMN_NAMES: readonly string[] = PRICE_COLUMNS;

export interface ExcerptOptions {
  /** Trailing window: calendar days or row count depending on `selection` */
  window: number;
  /** Default 'calendar'; falls back to 'rows' for undated tables */
  selection?: ExcerptSelection;
  /**
   * Columns to render, in order. Absent columns are skipped.
   * Default: close followed by every indicator column of the table.
   */
  columns?: readonly string[];
  /** Decimal places (default 2) */
  decimals?: number;
}

export interface ReportExcerpt {
  /** Markdown table */
  text: string;
  rows: number;
  columns: readonly string[];
  /** Selection actually applied */
  selection: ExcerptSelection;
}

/**
 * Trailing window of the table. Calendar selection needs a dated table and
 * falls back to row count otherwise.
 */
export function selectRecent(
  table: TimeSeriesTable,
  window: number,
  selection: ExcerptSelection = 'calendar'
): { view: TimeSeriesTable; selection: ExcerptSelection } {
  if (selection === 'calendar' && table.hasDistinctDates()) {
    return { view: table.lastDays(window), selection: 'calendar' };
  }
  if (selection === 'calendar') {
    logger.warn('Table has no date index, selecting recent rows by count');
  }
  return { view: table.tail(window), selection: 'rows' };
}

function defaultColumns(table: TimeSeriesTable): string[] {
  const indicators = table.columnNames().filter((name) => !PRICE_COLUMN_NAMES.includes(name));
  return [SOURCE_COLUMN, ...indicators];
}

function formatLabel(label: RowLabel): string {
  return typeof label === 'number' ? String(label) : format(label, 'yyyy-MM-dd');
}

function formatCell(value: SeriesValue, decimals: number): string {
  return value === null ? MISSING_CELL : value.toFixed(decimals);
}

/**
 * Render the trailing window of an indicator-augmented table as a Markdown
 * table for the report stage.
 *
 * @throws PipelineError('EmptySelection') if the window selects no rows
 * @throws PipelineError('UnknownColumn') if none of the requested columns exist
 */
export function formatExcerpt(table: TimeSeriesTable, options: ExcerptOptions): ReportExcerpt {
  const decimals = options.decimals ?? 2;
  const { view, selection } = selectRecent(table, options.window, options.selection);

  if (view.length() === 0) {
    throw new PipelineError(
      'EmptySelection',
      `No data found within the last ${options.window} ${selection === 'calendar' ? 'days' : 'rows'}`,
      { window: options.window, selection, tableRows: table.length() }
    );
  }

  const requested = options.columns ?? defaultColumns(table);
  const columns = requested.filter((name) => view.hasColumn(name));
  const skipped = requested.filter((name) => !view.hasColumn(name));
  if (skipped.length > 0) {
    logger.debug({ skipped }, 'Skipping columns absent from the table');
  }
  if (columns.length === 0) {
    throw new PipelineError('UnknownColumn', `None of the columns ${requested.join(', ')} exist`, {
      requested,
    });
  }

  const indexHeader = view.hasDistinctDates() ? 'Date' : 'Row';
  const series = columns.map((name) => view.column(name));

  const lines = [
    `| ${[indexHeader, ...columns].join(' | ')} |`,
    `| ${['---', ...columns.map(() => '---:')].join(' | ')} |`,
  ];
  for (let i = 0; i < view.length(); i++) {
    const cells = series.map((values) => formatCell(values[i], decimals));
    lines.push(`| ${[formatLabel(view.rowLabel(i)), ...cells].join(' | ')} |`);
  }

  return {
    text: lines.join('\n'),
    rows: view.length(),
    columns,
    selection,
  };
}
