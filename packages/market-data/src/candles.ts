// OHLCV series, oldest first, as loaded by the root menu and consumed by indicators

export interface Candles {
  /** Unix seconds */
  timestamps: number[];
  open: number[];
  high: number[];
  low: number[];
  close: number[];
  volume: number[];
}

export function candleCount(candles: Candles): number {
  return candles.close.length;
}

/** ISO date (YYYY-MM-DD) for daily data, ISO minute precision for intraday */
export function candleLabel(timestamp: number, intraday: boolean): string {
  const iso = new Date(timestamp * 1000).toISOString();
  return intraday ? iso.slice(0, 16).replace('T', ' ') : iso.slice(0, 10);
}
