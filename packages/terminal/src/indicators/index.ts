export { ad, obv } from './volume.js';
export { adx, aroon } from './trend.js';
export { bbands, ema, sma, vwap } from './overlap.js';
export { cci, macd, rsi, stoch } from './momentum.js';
export { alignRight, indicatorTable, shift } from './series.js';
export type { IndicatorColumns, IndicatorTableOptions, Series } from './series.js';
