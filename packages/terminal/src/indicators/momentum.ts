// Momentum oscillators

import type { Candles } from '@marketshell/market-data';
import { CCI, MACD, RSI, Stochastic } from 'technicalindicators';
import type { IndicatorColumns } from './series.js';

export function cci(candles: Candles, period: number): IndicatorColumns {
  return [[`CCI_${period}`, CCI.calculate({ high: candles.high, low: candles.low, close: candles.close, period })]];
}

export function macd(candles: Candles, fast: number, slow: number, signal: number): IndicatorColumns {
  const out = MACD.calculate({
    values: candles.close,
    fastPeriod: fast,
    slowPeriod: slow,
    signalPeriod: signal,
    SimpleMAOscillator: false,
    SimpleMASignal: false,
  });
  const suffix = `${fast}_${slow}_${signal}`;
  return [
    [`MACD_${suffix}`, out.map(m => m.MACD ?? null)],
    [`MACDh_${suffix}`, out.map(m => m.histogram ?? null)],
    [`MACDs_${suffix}`, out.map(m => m.signal ?? null)],
  ];
}

export function rsi(candles: Candles, period: number): IndicatorColumns {
  return [[`RSI_${period}`, RSI.calculate({ period, values: candles.close })]];
}

export function stoch(candles: Candles, kPeriod: number, dPeriod: number): IndicatorColumns {
  const out = Stochastic.calculate({
    high: candles.high,
    low: candles.low,
    close: candles.close,
    period: kPeriod,
    signalPeriod: dPeriod,
  });
  const suffix = `${kPeriod}_${dPeriod}`;
  // %D is undefined until signalPeriod %K values exist
  const d: Array<number | undefined> = out.map(s => s.d);
  return [
    [`STOCHk_${suffix}`, out.map(s => s.k)],
    [`STOCHd_${suffix}`, d.map(v => v ?? null)],
  ];
}
