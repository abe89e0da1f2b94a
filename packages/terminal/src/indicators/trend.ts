import type { Candles } from '@marketshell/market-data';
import { ADX } from 'technicalindicators';
import type { IndicatorColumns, Series } from './series.js';

export function adx(candles: Candles, period: number): IndicatorColumns {
  const out = ADX.calculate({ high: candles.high, low: candles.low, close: candles.close, period });
  return [
    [`ADX_${period}`, out.map(a => a.adx)],
    [`DMP_${period}`, out.map(a => a.pdi)],
    [`DMN_${period}`, out.map(a => a.mdi)],
  ];
}

/** Periods since the most recent extreme in values[end - length .. end] */
function periodsSince(values: readonly number[], end: number, length: number, better: (a: number, b: number) => boolean): number {
  let best = end;
  for (let j = end - 1; j >= end - length; j--) {
    if (better(values[j] ?? 0, values[best] ?? 0)) best = j;
  }
  return end - best;
}

/**
 * Aroon up/down over a window of `length + 1` bars. Up is
 * 100 * (length - periods since highest high) / length; down uses the lowest low.
 */
export function aroon(candles: Candles, length: number): IndicatorColumns {
  const n = candles.high.length;
  const up: Series = [];
  const down: Series = [];
  const osc: Series = [];
  for (let i = 0; i < n; i++) {
    if (i < length) {
      up.push(null);
      down.push(null);
      osc.push(null);
      continue;
    }
    const u = (100 * (length - periodsSince(candles.high, i, length, (a, b) => a > b))) / length;
    const d = (100 * (length - periodsSince(candles.low, i, length, (a, b) => a < b))) / length;
    up.push(u);
    down.push(d);
    osc.push(u - d);
  }
  return [
    [`AROOND_${length}`, down],
    [`AROONU_${length}`, up],
    [`AROONOSC_${length}`, osc],
  ];
}
