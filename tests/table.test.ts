import { describe, it, expect } from 'vitest';
import { headTable, normalizeTable, tableFromRecords, type Table } from '../src/utils/table.js';
import { HISTORY_TABLE } from './helpers/fake-provider.js';

describe('normalizeTable', () => {
  it('turns a missing or empty table into an empty mapping', () => {
    expect(normalizeTable(null)).toEqual({});
    expect(normalizeTable(undefined)).toEqual({});
    expect(normalizeTable({ columns: ['Close'], rows: [] })).toEqual({});
  });

  it('materializes the time index as the first field', () => {
    const records = normalizeTable(HISTORY_TABLE);

    expect(records).toEqual([
      { Date: '2024-03-04T14:30:00.000Z', Open: 100, High: 105, Low: 99, Close: 104, Volume: 1000 },
      { Date: '2024-03-05T14:30:00.000Z', Open: 104, High: 106, Low: 101, Close: 102, Volume: 1200 },
    ]);
    expect(Array.isArray(records) && Object.keys(records[0])).toEqual(['Date', 'Open', 'High', 'Low', 'Close', 'Volume']);
  });

  it('renders dates as ISO text and non-finite numbers as null', () => {
    const table: Table = {
      columns: ['Holder', 'Reported', 'pctHeld', 'Broken'],
      rows: [['Example Fund', new Date('2024-01-15T00:00:00.000Z'), Number.NaN, new Date(Number.NaN)]],
    };

    expect(normalizeTable(table)).toEqual([
      { Holder: 'Example Fund', Reported: '2024-01-15T00:00:00.000Z', pctHeld: null, Broken: null },
    ]);
  });

  it('fills short rows with null', () => {
    expect(normalizeTable({ columns: ['a', 'b'], rows: [[1]] })).toEqual([{ a: 1, b: null }]);
  });
});

describe('headTable', () => {
  it('keeps the first rows together with their index values', () => {
    const head = headTable(HISTORY_TABLE, 1);

    expect(head.rows).toEqual([[100, 105, 99, 104, 1000]]);
    expect(head.index?.values).toEqual([new Date('2024-03-04T14:30:00.000Z')]);
  });

  it('treats a negative limit as zero', () => {
    expect(headTable(HISTORY_TABLE, -3).rows).toEqual([]);
  });
});

describe('tableFromRecords', () => {
  it('collects columns in first-seen order', () => {
    const table = tableFromRecords([{ strike: 100, bid: 1.2 }, { strike: 105, ask: 0.9 }]);

    expect(table.columns).toEqual(['strike', 'bid', 'ask']);
    expect(table.rows).toEqual([
      [100, 1.2, null],
      [105, null, 0.9],
    ]);
    expect(table.index).toBeUndefined();
  });

  it('moves the index key out of the columns', () => {
    const endDate = new Date('2023-12-31T00:00:00.000Z');
    const table = tableFromRecords([{ endDate, totalRevenue: 500 }], { indexKey: 'endDate', indexName: 'Date' });

    expect(table.columns).toEqual(['totalRevenue']);
    expect(table.index).toEqual({ name: 'Date', values: [endDate] });
    expect(normalizeTable(table)).toEqual([{ Date: '2023-12-31T00:00:00.000Z', totalRevenue: 500 }]);
  });
});
