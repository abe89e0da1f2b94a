export { VendorClient } from './client.js';
export type { QueryParams, RequestOptions, VendorClientOptions, VendorCredential } from './client.js';
export { ConfigError, formatIssues, loadMarketDataConfig, MarketDataEnvSchema } from './config.js';
export type { MarketDataConfig } from './config.js';
export { isUpstreamError, UpstreamFormatError, UpstreamUnavailable } from './errors.js';
export { headRows, keyValueTable, tableFromRecords, tailRows, toCell } from './table.js';
export type { Cell, Table } from './table.js';
export { candleCount, candleLabel } from './candles.js';
export type { Candles } from './candles.js';
export { CacheTTL, createVendorClients } from './vendors.js';
export type { VendorClients } from './vendors.js';

export * as coingecko from './sources/coingecko.js';
export * as ethGasStation from './sources/ethgasstation.js';
export * as finbrain from './sources/finbrain.js';
export * as finnhub from './sources/finnhub.js';
export * as finviz from './sources/finviz.js';
export * as marketWatch from './sources/marketwatch.js';
export * as tradingView from './sources/tradingview.js';
