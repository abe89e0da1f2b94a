// Indicator outputs are shorter than their input by the warm-up window

import { candleCount, candleLabel, type Candles, type Cell, type Table } from '@marketshell/market-data';

export type Series = Array<number | null>;

/** Named output columns of one indicator, in display order */
export type IndicatorColumns = Array<[name: string, values: Series]>;

/** Right-align `values` to `length` entries, padding the front with null */
export function alignRight(values: ReadonlyArray<number | null | undefined>, length: number): Series {
  const tail = values.slice(Math.max(0, values.length - length)).map(v => (v == null || !Number.isFinite(v) ? null : v));
  return [...new Array<null>(length - tail.length).fill(null), ...tail];
}

/** Shift forward by `offset` periods, keeping the length */
export function shift(values: Series, offset: number): Series {
  if (offset <= 0) return [...values];
  return [...new Array<null>(Math.min(offset, values.length)).fill(null), ...values.slice(0, Math.max(0, values.length - offset))];
}

export interface IndicatorTableOptions {
  intraday?: boolean;
  offset?: number;
}

export function indicatorTable(
  title: string,
  candles: Candles,
  columns: IndicatorColumns,
  options: IndicatorTableOptions = {},
): Table {
  const n = candleCount(candles);
  const shifted = columns.map(([, values]) => shift(alignRight(values, n), options.offset ?? 0));
  const rows: Cell[][] = [];
  for (let i = 0; i < n; i++) {
    rows.push([
      candleLabel(candles.timestamps[i] ?? 0, options.intraday ?? false),
      candles.close[i] ?? null,
      ...shifted.map(s => s[i] ?? null),
    ]);
  }
  return { title, columns: ['date', 'close', ...columns.map(([name]) => name)], rows };
}
