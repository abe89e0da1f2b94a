import type { VendorClient } from '../client.js';
import { UpstreamFormatError } from '../errors.js';
import { ScanResponseSchema } from '../schemas/tradingview.js';
import type { Cell, Table } from '../table.js';
import { CacheTTL } from '../vendors.js';

export const INTERVAL_NAMES = ['1m', '5m', '15m', '1h', '4h', '1d', '1W', '1M'] as const;

export type Interval = (typeof INTERVAL_NAMES)[number];

/** Column suffix the scanner uses per interval; daily has none */
export const INTERVALS: Record<Interval, string> = {
  '1m': '|1',
  '5m': '|5',
  '15m': '|15',
  '1h': '|60',
  '4h': '|240',
  '1d': '',
  '1W': '|1W',
  '1M': '|1M',
};

export type Recommendation = 'STRONG_SELL' | 'SELL' | 'NEUTRAL' | 'BUY' | 'STRONG_BUY';

export function recommendationLabel(score: number): Recommendation {
  if (score < -0.5) return 'STRONG_SELL';
  if (score < -0.1) return 'SELL';
  if (score <= 0.1) return 'NEUTRAL';
  if (score <= 0.5) return 'BUY';
  return 'STRONG_BUY';
}

const SCORE_FIELDS = ['Recommend.All', 'Recommend.Other', 'Recommend.MA'] as const;

/**
 * One scan request covering every asked interval. An empty `interval` means all of them.
 */
export async function recommendation(
  client: VendorClient,
  ticker: string,
  screener: string,
  exchange: string,
  interval: Interval | '',
): Promise<Table> {
  const intervals: Interval[] = interval ? [interval] : [...INTERVAL_NAMES];
  const columns = intervals.flatMap(iv => SCORE_FIELDS.map(field => `${field}${INTERVALS[iv]}`));
  const symbol = `${exchange.toUpperCase()}:${ticker.toUpperCase()}`;

  const res = await client.postJson(
    `${encodeURIComponent(screener.toLowerCase())}/scan`,
    { symbols: { tickers: [symbol], query: { types: [] } }, columns },
    ScanResponseSchema,
    { cacheTtl: CacheTTL.SHORT },
  );

  const row = res.data[0];
  if (!row) throw new UpstreamFormatError(client.name, `exchange or symbol not found: ${symbol}`);
  if (row.d.length < columns.length) {
    throw new UpstreamFormatError(client.name, `expected ${columns.length} values, got ${row.d.length}`);
  }

  const rows: Cell[][] = intervals.map((iv, i) => {
    const scores = row.d.slice(i * SCORE_FIELDS.length, (i + 1) * SCORE_FIELDS.length);
    return [iv, ...scores.map(s => (s == null ? null : recommendationLabel(s)))];
  });

  return {
    title: 'Ticker Recommendation',
    columns: ['Interval', 'Recommendation', 'Oscillators', 'Moving Averages'],
    rows,
  };
}
