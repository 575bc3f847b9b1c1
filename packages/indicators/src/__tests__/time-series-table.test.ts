import { describe, it, expect } from 'vitest';
import type { PriceRecord } from '@pricepipe/schemas';
import { isPipelineError } from '@pricepipe/utils';
import { TimeSeriesTable } from '../table/time-series-table.js';

/**
 * Factory function to create consecutive daily records starting 2024-01-01
 */
function makeRecords(closes: Array<number | null>, startDay = 1): PriceRecord[] {
  return closes.map((close, i) => ({
    date: new Date(2024, 0, startDay + i),
    open: close,
    high: close,
    low: close,
    close,
    adjustedClose: close,
    volume: 1000,
  }));
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isPipelineError(error) ? error.code : 'not-a-pipeline-error';
  }
  return undefined;
}

describe('TimeSeriesTable', () => {
  describe('fromRecords()', () => {
    it('exposes every price column aligned by row', () => {
      const table = TimeSeriesTable.fromRecords(makeRecords([10, null, 12]));

      expect(table.length()).toBe(3);
      expect(table.columnNames()).toEqual([
        'open',
        'high',
        'low',
        'close',
        'adjustedClose',
        'volume',
      ]);
      expect(table.column('close')).toEqual([10, null, 12]);
      expect(table.hasDistinctDates()).toBe(true);
    });

    it('rejects duplicate or descending dates', () => {
      const records = makeRecords([1, 2, 3]);
      records[2] = { ...records[2], date: records[1].date };

      expect(codeOf(() => TimeSeriesTable.fromRecords(records))).toBe('UnorderedDates');
      expect(codeOf(() => TimeSeriesTable.fromRecords(makeRecords([1, 2]).reverse()))).toBe(
        'UnorderedDates'
      );
    });

    it('rejects invalid dates', () => {
      const records = makeRecords([1, 2]);
      records[0] = { ...records[0], date: new Date('not a date') };

      expect(codeOf(() => TimeSeriesTable.fromRecords(records))).toBe('InvalidDate');
    });
  });

  describe('fromColumns()', () => {
    it('builds an undated table labelled by row index', () => {
      const table = TimeSeriesTable.fromColumns({ close: [1, 2, 3] });

      expect(table.length()).toBe(3);
      expect(table.hasDistinctDates()).toBe(false);
      expect(table.dates()).toBeNull();
      expect(table.rowLabel(2)).toBe(2);
    });

    it('rejects columns of different lengths', () => {
      expect(codeOf(() => TimeSeriesTable.fromColumns({ close: [1, 2], open: [1] }))).toBe(
        'LengthMismatch'
      );
    });

    it('rejects dates that do not match the column length', () => {
      expect(
        codeOf(() => TimeSeriesTable.fromColumns({ close: [1, 2] }, [new Date(2024, 0, 1)]))
      ).toBe('LengthMismatch');
    });
  });

  describe('column()', () => {
    it('fails with UnknownColumn for unregistered names', () => {
      const table = TimeSeriesTable.fromColumns({ close: [1] });

      expect(codeOf(() => table.column('SMA_5'))).toBe('UnknownColumn');
    });
  });

  describe('addColumn()', () => {
    it('appends a column of matching length', () => {
      const table = TimeSeriesTable.fromColumns({ close: [1, 2] });
      table.addColumn('SMA_2', [null, 1.5]);

      expect(table.columnNames()).toEqual(['close', 'SMA_2']);
      expect(table.column('SMA_2')).toEqual([null, 1.5]);
    });

    it('fails with LengthMismatch when lengths differ', () => {
      const table = TimeSeriesTable.fromColumns({ close: [1, 2] });

      expect(codeOf(() => table.addColumn('SMA_2', [1]))).toBe('LengthMismatch');
      expect(table.hasColumn('SMA_2')).toBe(false);
    });

    it('fails with DuplicateColumn when the name exists', () => {
      const table = TimeSeriesTable.fromColumns({ close: [1, 2] });
      table.addColumn('SMA_2', [null, 1.5]);

      expect(codeOf(() => table.addColumn('SMA_2', [null, 1.5]))).toBe('DuplicateColumn');
      expect(codeOf(() => table.addColumn('close', [0, 0]))).toBe('DuplicateColumn');
      expect(table.column('close')).toEqual([1, 2]);
    });

    it('copies the values it is given', () => {
      const table = TimeSeriesTable.fromColumns({ close: [1, 2] });
      const values = [null, 1.5];
      table.addColumn('SMA_2', values);
      values[1] = 99;

      expect(table.column('SMA_2')).toEqual([null, 1.5]);
    });
  });

  describe('tail()', () => {
    it('returns every row when n exceeds the length, without padding', () => {
      const table = TimeSeriesTable.fromRecords(makeRecords([1, 2, 3, 4, 5]));
      const view = table.tail(10);

      expect(view.length()).toBe(5);
      expect(view.column('close')).toEqual([1, 2, 3, 4, 5]);
    });

    it('returns the last n rows and preserves the column set', () => {
      const table = TimeSeriesTable.fromColumns({ close: [1, 2, 3, 4, 5] });
      table.addColumn('SMA_2', [null, 1.5, 2.5, 3.5, 4.5]);
      const view = table.tail(2);

      expect(view.columnNames()).toEqual(['close', 'SMA_2']);
      expect(view.column('close')).toEqual([4, 5]);
      expect(view.column('SMA_2')).toEqual([3.5, 4.5]);
      // Row labels keep the originating row index
      expect(view.rowLabel(0)).toBe(3);
    });

    it('returns an empty view for n = 0', () => {
      const table = TimeSeriesTable.fromColumns({ close: [1, 2] });

      expect(table.tail(0).length()).toBe(0);
    });

    it('returns a read-only view', () => {
      const view = TimeSeriesTable.fromColumns({ close: [1, 2] }).tail(1);

      expect(view.readOnly).toBe(true);
      expect(codeOf(() => view.addColumn('SMA_1', [1]))).toBe('ReadOnlyView');
    });
  });

  describe('lastDays()', () => {
    it('selects rows dated strictly after lastDate - days', () => {
      // 2024-01-01 .. 2024-01-10
      const table = TimeSeriesTable.fromRecords(makeRecords([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]));
      const view = table.lastDays(3);

      // cutoff = 2024-01-07, rows 01-08 .. 01-10
      expect(view.column('close')).toEqual([8, 9, 10]);
      expect(view.rowLabel(0)).toEqual(new Date(2024, 0, 8));
    });

    it('counts calendar days, not rows, across gaps', () => {
      const records = makeRecords([1, 2, 3, 4]);
      records[3] = { ...records[3], date: new Date(2024, 0, 20) };
      const table = TimeSeriesTable.fromRecords(records);

      expect(table.lastDays(5).column('close')).toEqual([4]);
    });

    it('fails on undated tables', () => {
      const table = TimeSeriesTable.fromColumns({ close: [1] });

      expect(codeOf(() => table.lastDays(3))).toBe('InvalidDate');
    });
  });

  describe('clone()', () => {
    it('produces an independent writable copy', () => {
      const table = TimeSeriesTable.fromColumns({ close: [1, 2] });
      const copy = table.clone();
      copy.addColumn('SMA_2', [null, 1.5]);

      expect(table.hasColumn('SMA_2')).toBe(false);
      expect(copy.tail(1).clone().readOnly).toBe(false);
    });
  });
});
