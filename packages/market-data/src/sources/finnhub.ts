// Finnhub — OHLCV candles and chart pattern recognition

import type { Candles } from '../candles.js';
import type { VendorClient } from '../client.js';
import { UpstreamFormatError } from '../errors.js';
import { CandleResponseSchema, PatternScanSchema } from '../schemas/finnhub.js';
import type { Table } from '../table.js';
import { CacheTTL } from '../vendors.js';

export type Resolution = '1' | '5' | '15' | '30' | '60' | 'D' | 'W' | 'M';

export async function candles(
  client: VendorClient,
  ticker: string,
  resolution: Resolution,
  from: Date,
  to: Date,
): Promise<Candles> {
  const data = await client.getJson(
    'stock/candle',
    {
      symbol: ticker.toUpperCase(),
      resolution,
      from: Math.floor(from.getTime() / 1000),
      to: Math.floor(to.getTime() / 1000),
    },
    CandleResponseSchema,
    { cacheTtl: CacheTTL.SHORT },
  );

  if (data.s === 'no_data' || data.t.length === 0) {
    throw new UpstreamFormatError(client.name, `no price data for ${ticker.toUpperCase()}`);
  }
  const n = data.t.length;
  if ([data.o, data.h, data.l, data.c, data.v].some(series => series.length !== n)) {
    throw new UpstreamFormatError(client.name, 'candle series have mismatched lengths');
  }

  return { timestamps: data.t, open: data.o, high: data.h, low: data.l, close: data.c, volume: data.v };
}

function isoDate(seconds: number | null | undefined): string | null {
  return seconds ? new Date(seconds * 1000).toISOString().slice(0, 10) : null;
}

export async function patternRecognition(client: VendorClient, ticker: string, resolution: Resolution): Promise<Table> {
  const data = await client.getJson(
    'scan/pattern',
    { symbol: ticker.toUpperCase(), resolution },
    PatternScanSchema,
    { cacheTtl: CacheTTL.SHORT },
  );

  return {
    title: 'Pattern Recognition',
    columns: ['Pattern', 'Type', 'Status', 'Entry', 'Stop Loss', 'Target', 'Start', 'End'],
    rows: data.points.map(p => [
      p.patternname,
      p.patterntype,
      p.status ?? null,
      p.entry ?? null,
      p.stoploss ?? null,
      p.profit1 ?? null,
      isoDate(p.atime),
      isoDate(p.dtime),
    ]),
  };
}
