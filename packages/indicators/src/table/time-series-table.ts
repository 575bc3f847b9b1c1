/**
 * Time-Series Table
 *
 * Ordered daily rows with named numeric columns. Price columns are set at
 * construction; indicator columns are appended with `addColumn` and never
 * rewritten. Every column has exactly `length()` entries, `null` marking a
 * missing value.
 */

import { subDays } from 'date-fns';
import { PRICE_COLUMNS, type PriceRecord } from '@pricepipe/schemas';
import { PipelineError } from '@pricepipe/utils';

/** A column value; `null` is the missing marker */
export type SeriesValue = number | null;
export type Series = readonly SeriesValue[];

/** Row label: the row's date, or its row index for undated tables */
export type RowLabel = Date | number;

interface TableInit {
  columns: Map<string, SeriesValue[]>;
  dates: readonly Date[] | null;
  rowCount: number;
  firstRow: number;
  readOnly: boolean;
}

function assertAscendingDates(dates: readonly Date[]): void {
  for (let i = 0; i < dates.length; i++) {
    const time = dates[i].getTime();
    if (Number.isNaN(time)) {
      throw new PipelineError('InvalidDate', `Invalid date at row ${i}`, { row: i });
    }
    if (i > 0 && time <= dates[i - 1].getTime()) {
      throw new PipelineError(
        'UnorderedDates',
        `Dates must be unique and ascending (row ${i})`,
        { row: i }
      );
    }
  }
}

export class TimeSeriesTable {
  private readonly columnMap: Map<string, SeriesValue[]>;
  private readonly dateIndex: readonly Date[] | null;
  private readonly rowCount: number;
  /** Row index of this table's first row in the table it was taken from */
  private readonly firstRow: number;
  /** Views returned by `tail`/`lastDays` reject `addColumn` */
  readonly readOnly: boolean;

  private constructor(init: TableInit) {
    this.columnMap = init.columns;
    this.dateIndex = init.dates;
    this.rowCount = init.rowCount;
    this.firstRow = init.firstRow;
    this.readOnly = init.readOnly;
  }

  /**
   * Build a dated table from validated price records (ascending, unique dates)
   */
  static fromRecords(records: readonly PriceRecord[]): TimeSeriesTable {
    const columns = new Map<string, SeriesValue[]>();
    for (const name of PRICE_COLUMNS) {
      columns.set(name, records.map((record) => record[name]));
    }
    const dates = records.map((record) => record.date);
    assertAscendingDates(dates);

    return new TimeSeriesTable({
      columns,
      dates,
      rowCount: records.length,
      firstRow: 0,
      readOnly: false,
    });
  }

  /**
   * Build a table from raw columns. Dates are optional; undated tables are
   * labelled by row index and only support row-count selection.
   */
  static fromColumns(
    columns: Record<string, Series>,
    dates?: readonly Date[]
  ): TimeSeriesTable {
    const entries = Object.entries(columns);
    const rowCount = dates?.length ?? entries[0]?.[1].length ?? 0;

    for (const [name, values] of entries) {
      if (values.length !== rowCount) {
        throw new PipelineError(
          'LengthMismatch',
          `Column '${name}' has ${values.length} values, expected ${rowCount}`,
          { column: name, expected: rowCount, actual: values.length }
        );
      }
    }
    if (dates) {
      assertAscendingDates(dates);
    }

    return new TimeSeriesTable({
      columns: new Map(entries.map(([name, values]): [string, SeriesValue[]] => [name, [...values]])),
      dates: dates ? [...dates] : null,
      rowCount,
      firstRow: 0,
      readOnly: false,
    });
  }

  length(): number {
    return this.rowCount;
  }

  hasColumn(name: string): boolean {
    return this.columnMap.has(name);
  }

  /**
   * Column names in registration order (price columns first)
   */
  columnNames(): string[] {
    return [...this.columnMap.keys()];
  }

  /**
   * Values of a price or indicator column
   * @throws PipelineError('UnknownColumn') if the column was never registered
   */
  column(name: string): Series {
    const values = this.columnMap.get(name);
    if (!values) {
      throw new PipelineError('UnknownColumn', `Unknown column '${name}'`, {
        column: name,
        available: this.columnNames(),
      });
    }
    return values;
  }

  /**
   * Register a new indicator column
   * @throws PipelineError('ReadOnlyView' | 'DuplicateColumn' | 'LengthMismatch')
   */
  addColumn(name: string, values: Series): void {
    if (this.readOnly) {
      throw new PipelineError('ReadOnlyView', `Cannot add column '${name}' to a read-only view`, {
        column: name,
      });
    }
    if (this.columnMap.has(name)) {
      throw new PipelineError('DuplicateColumn', `Column '${name}' already exists`, {
        column: name,
      });
    }
    if (values.length !== this.rowCount) {
      throw new PipelineError(
        'LengthMismatch',
        `Column '${name}' has ${values.length} values, expected ${this.rowCount}`,
        { column: name, expected: this.rowCount, actual: values.length }
      );
    }
    this.columnMap.set(name, [...values]);
  }

  /**
   * True when rows can be addressed by calendar date
   */
  hasDistinctDates(): boolean {
    return this.dateIndex !== null;
  }

  dates(): readonly Date[] | null {
    return this.dateIndex;
  }

  /**
   * Date of row `i`, or its row index (relative to the originating table)
   * when the table is undated
   */
  rowLabel(i: number): RowLabel {
    return this.dateIndex ? this.dateIndex[i] : this.firstRow + i;
  }

  /**
   * Last `min(n, length())` rows as a read-only view. Never pads.
   */
  tail(n: number): TimeSeriesTable {
    const count = Math.min(Math.max(Math.floor(n), 0), this.rowCount);
    return this.view(this.rowCount - count, this.rowCount);
  }

  /**
   * Rows dated strictly after `lastDate - days` as a read-only view
   * @throws PipelineError('InvalidDate') when the table is undated
   */
  lastDays(days: number): TimeSeriesTable {
    const dates = this.dateIndex;
    if (!dates) {
      throw new PipelineError('InvalidDate', 'Calendar selection requires a dated table');
    }
    if (dates.length === 0 || days <= 0) {
      return this.view(this.rowCount, this.rowCount);
    }

    const cutoff = subDays(dates[dates.length - 1], days).getTime();
    let start = dates.length;
    while (start > 0 && dates[start - 1].getTime() > cutoff) {
      start--;
    }
    return this.view(start, this.rowCount);
  }

  /**
   * Independent, writable copy
   */
  clone(): TimeSeriesTable {
    return new TimeSeriesTable({
      columns: new Map(
        [...this.columnMap].map(([name, values]): [string, SeriesValue[]] => [name, [...values]])
      ),
      dates: this.dateIndex ? [...this.dateIndex] : null,
      rowCount: this.rowCount,
      firstRow: this.firstRow,
      readOnly: false,
    });
  }

  private view(start: number, end: number): TimeSeriesTable {
    return new TimeSeriesTable({
      columns: new Map(
        [...this.columnMap].map(([name, values]): [string, SeriesValue[]] => [
          name,
          values.slice(start, end),
        ])
      ),
      dates: this.dateIndex ? this.dateIndex.slice(start, end) : null,
      rowCount: end - start,
      firstRow: this.firstRow + start,
      readOnly: true,
    });
  }
}
