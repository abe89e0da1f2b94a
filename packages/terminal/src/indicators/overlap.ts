import type { Candles } from '@marketshell/market-data';
import { BollingerBands, EMA, SMA, VWAP } from 'technicalindicators';
import type { IndicatorColumns, Series } from './series.js';

export function ema(candles: Candles, lengths: readonly number[]): IndicatorColumns {
  return lengths.map((period): [string, Series] => [`EMA_${period}`, EMA.calculate({ period, values: candles.close })]);
}

export function sma(candles: Candles, lengths: readonly number[]): IndicatorColumns {
  return lengths.map((period): [string, Series] => [`SMA_${period}`, SMA.calculate({ period, values: candles.close })]);
}

export function vwap(candles: Candles): IndicatorColumns {
  return [
    ['VWAP', VWAP.calculate({ high: candles.high, low: candles.low, close: candles.close, volume: candles.volume })],
  ];
}

export function bbands(candles: Candles, period: number, stdDev: number): IndicatorColumns {
  const out = BollingerBands.calculate({ period, stdDev, values: candles.close });
  const suffix = `${period}_${stdDev}`;
  return [
    [`BBL_${suffix}`, out.map(b => b.lower)],
    [`BBM_${suffix}`, out.map(b => b.middle)],
    [`BBU_${suffix}`, out.map(b => b.upper)],
  ];
}
