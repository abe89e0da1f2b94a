// Volume studies

import type { Candles } from '@marketshell/market-data';
import { ADL, OBV } from 'technicalindicators';
import type { IndicatorColumns } from './series.js';

/** Accumulation/distribution line */
export function ad(candles: Candles): IndicatorColumns {
  return [['AD', ADL.calculate({ high: candles.high, low: candles.low, close: candles.close, volume: candles.volume })]];
}

/** On-balance volume */
export function obv(candles: Candles): IndicatorColumns {
  return [['OBV', OBV.calculate({ close: candles.close, volume: candles.volume })]];
}
