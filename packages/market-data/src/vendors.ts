// One configured VendorClient per upstream

import { VendorClient } from './client.js';
import type { MarketDataConfig } from './config.js';

const BROWSER_UA =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const CacheTTL = {
  REALTIME: 30,       // quotes, gas prices
  SHORT: 300,         // 5 min — recommendations, patterns
  MEDIUM: 3600,       // 1 hour — statements, filings
  LONG: 86400,        // 24 hours — coin metadata
} as const;

export interface VendorClients {
  coingecko: VendorClient;
  ethGasStation: VendorClient;
  marketWatch: VendorClient;
  tradingView: VendorClient;
  finviz: VendorClient;
  finbrain: VendorClient;
  finnhub: VendorClient;
}

export function createVendorClients(config: MarketDataConfig): VendorClients {
  const common = {
    timeoutMs: config.timeoutMs,
    rateLimit: config.rateLimit,
    cacheTtl: config.cacheTtl,
  };

  return {
    coingecko: new VendorClient({ ...common, name: 'CoinGecko', baseUrl: 'https://api.coingecko.com/api/v3' }),
    ethGasStation: new VendorClient({
      ...common,
      name: 'EthGasStation',
      baseUrl: 'https://ethgasstation.info/api',
      credential: { param: 'api-key', value: config.ethGasStationApiKey, envVar: 'ETHGASSTATION_API_KEY', optional: true },
    }),
    marketWatch: new VendorClient({
      ...common,
      name: 'MarketWatch',
      baseUrl: 'https://www.marketwatch.com',
      headers: { 'User-Agent': BROWSER_UA },
    }),
    tradingView: new VendorClient({ ...common, name: 'TradingView', baseUrl: 'https://scanner.tradingview.com' }),
    finviz: new VendorClient({
      ...common,
      name: 'Finviz',
      baseUrl: 'https://finviz.com',
      headers: { 'User-Agent': BROWSER_UA },
    }),
    finbrain: new VendorClient({
      ...common,
      name: 'FinBrain',
      baseUrl: 'https://api.finbrain.tech/v0',
      credential: { param: 'token', value: config.finbrainApiKey, envVar: 'FINBRAIN_API_KEY', optional: true },
    }),
    finnhub: new VendorClient({
      ...common,
      name: 'Finnhub',
      baseUrl: 'https://finnhub.io/api/v1',
      credential: { param: 'token', value: config.finnhubApiKey, envVar: 'FINNHUB_API_KEY' },
    }),
  };
}
