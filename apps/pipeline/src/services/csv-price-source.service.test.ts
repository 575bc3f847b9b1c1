import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { format } from 'date-fns';
import { PipelineError } from '@pricepipe/utils';
import type { TimeSeriesTable } from '@pricepipe/indicators';
import {
  CsvPriceSource,
  parseCsvDate,
  parsePriceCell,
  parsePriceCsv,
} from './csv-price-source.service';

const HEADER = 'Date,Open,High,Low,Close,Adj Close,Volume';

function isoDates(table: TimeSeriesTable): string[] {
  return (table.dates() ?? []).map((date) => format(date, 'yyyy-MM-dd'));
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof PipelineError ? error.code : undefined;
  }
  return undefined;
}

describe('parseCsvDate', () => {
  it('accepts ISO and US dates', () => {
    expect(format(parseCsvDate('2024-02-29') ?? new Date(0), 'yyyy-MM-dd')).toBe('2024-02-29');
    expect(format(parseCsvDate('02/29/2024') ?? new Date(0), 'yyyy-MM-dd')).toBe('2024-02-29');
    expect(format(parseCsvDate('2/9/2024') ?? new Date(0), 'yyyy-MM-dd')).toBe('2024-02-09');
  });

  it('returns null for anything else', () => {
    expect(parseCsvDate('yesterday')).toBeNull();
    expect(parseCsvDate('')).toBeNull();
  });
});

describe('parsePriceCell', () => {
  it('parses numbers and keeps zero', () => {
    expect(parsePriceCell(' 12.5 ')).toBe(12.5);
    expect(parsePriceCell('0')).toBe(0);
    expect(parsePriceCell('1e3')).toBe(1000);
  });

  it('maps empty, non-numeric and negative cells to null', () => {
    expect(parsePriceCell('')).toBeNull();
    expect(parsePriceCell(undefined)).toBeNull();
    expect(parsePriceCell('abc')).toBeNull();
    expect(parsePriceCell('-3')).toBeNull();
    expect(parsePriceCell('Infinity')).toBeNull();
  });
});

describe('parsePriceCsv', () => {
  it('builds an ascending dated table and marks bad cells missing', () => {
    const table = parsePriceCsv(
      [
        HEADER,
        '01/04/2024,11,12,10,11.5,11.5,900',
        '2024-01-02,10,11,9,10.5,10.5,1000',
        '2024-01-03,10.5,11,10,abc,,1100',
        '',
      ].join('\n')
    );

    expect(table.length()).toBe(3);
    expect(isoDates(table)).toEqual(['2024-01-02', '2024-01-03', '2024-01-04']);
    expect(table.column('close')).toEqual([10.5, null, 11.5]);
    expect(table.column('adjustedClose')).toEqual([10.5, null, 11.5]);
    expect(table.column('volume')).toEqual([1000, 1100, 900]);
    expect(table.columnNames()).toEqual(['open', 'high', 'low', 'close', 'adjustedClose', 'volume']);
  });

  it('tolerates padded header names', () => {
    const table = parsePriceCsv(
      [' Date , Open , High , Low , Close , Adj Close , Volume ', '2024-01-02,1,2,0.5,1.5,1.5,10'].join('\n')
    );

    expect(table.column('close')).toEqual([1.5]);
  });

  it('returns an empty table for a header-only file', () => {
    expect(parsePriceCsv(`${HEADER}\n`).length()).toBe(0);
  });

  it('fails with InputAbsent listing missing columns', () => {
    const text = ['Date,Open,High,Low,Close,Volume', '2024-01-02,1,2,0.5,1.5,10'].join('\n');

    expect(() => parsePriceCsv(text)).toThrow('Missing required columns: Adj Close');
    expect(codeOf(() => parsePriceCsv(text))).toBe('InputAbsent');
  });

  it('fails with InvalidDate on an unparseable date', () => {
    const text = [HEADER, 'not-a-date,1,2,0.5,1.5,1.5,10'].join('\n');

    expect(() => parsePriceCsv(text)).toThrow("Could not parse date 'not-a-date' on line 2");
    expect(codeOf(() => parsePriceCsv(text))).toBe('InvalidDate');
  });

  it('fails with UnorderedDates on a repeated date', () => {
    const text = [HEADER, '2024-01-02,1,2,0.5,1.5,1.5,10', '01/02/2024,1,2,0.5,1.5,1.5,10'].join('\n');

    expect(codeOf(() => parsePriceCsv(text))).toBe('UnorderedDates');
  });
});

describe('CsvPriceSource', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'csv-source-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads a table from disk', async () => {
    const path = join(dir, 'prices.csv');
    await writeFile(path, [HEADER, '2024-01-02,1,2,0.5,1.5,1.5,10'].join('\n'));

    const table = await new CsvPriceSource(path).load();

    expect(table?.length()).toBe(1);
    expect(table?.column('close')).toEqual([1.5]);
  });

  it('signals absence for a missing file', async () => {
    expect(await new CsvPriceSource(join(dir, 'missing.csv')).load()).toBeNull();
  });
});
