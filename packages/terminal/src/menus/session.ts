// Read-only context handed to a sub-menu by the menu that opens it

import type { Candles } from '@marketshell/market-data';

export const LOAD_INTERVALS = ['1', '5', '15', '30', '60', '1440'] as const;
export type LoadInterval = (typeof LOAD_INTERVALS)[number];

export interface StockSession {
  readonly ticker: string;
  readonly start: Date;
  /** Minutes per candle; 1440 is daily */
  readonly interval: LoadInterval;
  readonly candles: Readonly<Candles>;
}

export function isIntraday(session: Pick<StockSession, 'interval'>): boolean {
  return session.interval !== '1440';
}

export function describeSession(session: StockSession): string {
  const period = isIntraday(session) ? `${session.interval}min` : 'Daily';
  return `${period} ${session.ticker} from ${session.start.toISOString().slice(0, 10)}`;
}

export interface CoinSession {
  /** CoinGecko id, e.g. "bitcoin" */
  readonly id: string;
  readonly name: string;
  readonly symbol: string;
}
