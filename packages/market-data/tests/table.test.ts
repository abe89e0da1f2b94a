import { describe, it, expect } from 'vitest';
import { headRows, keyValueTable, tableFromRecords, tailRows, toCell } from '../src/table.js';
import { candleLabel } from '../src/candles.js';

describe('Table helpers', () => {
  it('builds a table from records using the first record keys', () => {
    const table = tableFromRecords('Quotes', [
      { symbol: 'AAA', price: 1.5, live: true },
      { symbol: 'BBB', price: Number.NaN, live: false },
    ]);
    expect(table).toEqual({
      title: 'Quotes',
      columns: ['symbol', 'price', 'live'],
      rows: [
        ['AAA', 1.5, 'true'],
        ['BBB', null, 'false'],
      ],
    });
  });

  it('converts unsupported values to null', () => {
    expect(toCell(undefined)).toBeNull();
    expect(toCell({ nested: 1 })).toBeNull();
    expect(toCell(Infinity)).toBeNull();
  });

  it('slices head and tail rows', () => {
    const table = keyValueTable('KV', [['a', 1], ['b', 2], ['c', 3]]);
    expect(headRows(table, 2).rows).toEqual([['a', 1], ['b', 2]]);
    expect(tailRows(table, 2).rows).toEqual([['b', 2], ['c', 3]]);
    expect(tailRows(table, 0).rows).toEqual([]);
    expect(table.columns).toEqual(['Metric', 'Value']);
  });

  it('labels candles by date or minute', () => {
    expect(candleLabel(1672704000, false)).toBe('2023-01-03');
    expect(candleLabel(1672738200, true)).toBe('2023-01-03 09:30');
  });
});
