import { z } from 'zod';
import { INTERVAL_NAMES } from '../sources/tradingview.js';

export const TickerSchema = z.object({
  ticker: z.string().min(1).describe('Stock ticker symbol (e.g., AAPL, MSFT)'),
});

export const CoinViewSchema = z.object({
  coin: z.string().min(1).describe('CoinGecko coin id (e.g., bitcoin, algorand)'),
  view: z
    .enum(['info', 'market', 'ath', 'atl', 'web', 'social', 'dev', 'score', 'bc'])
    .default('info')
    .describe('Which coin view to return'),
  currency: z.enum(['usd', 'btc']).default('usd').describe('Quote currency for ath/atl views'),
});

export const PotentialReturnsSchema = z
  .object({
    coin: z.string().min(1).describe('Coin to evaluate (e.g., algorand)'),
    vs: z.string().min(1).optional().describe('Coin whose market cap to compare against (e.g., bitcoin)'),
    top: z.number().int().min(1).max(250).optional().describe('Compare against each of the top N coins by market cap'),
    price: z.number().positive().optional().describe('Target price in USD'),
  })
  .refine(v => v.vs !== undefined || v.top !== undefined || v.price !== undefined, {
    message: 'One of vs, top or price is required',
  });

export const SecFilingsSchema = TickerSchema.extend({
  limit: z.number().int().min(1).max(100).default(5).describe('Number of filings to return'),
});

export const CompareSchema = z.object({
  tickers: z.array(z.string().min(1)).min(1).max(10).describe('Tickers to compare, first is the reference'),
  statement: z.enum(['income', 'balance', 'cashflow']).describe('Financial statement'),
  timeframe: z.string().optional().describe('Period column, e.g. 2022 (defaults to the latest)'),
  quarter: z.boolean().default(false).describe('Use quarterly statements'),
});

export const RecommendationSchema = TickerSchema.extend({
  screener: z.string().default('america').describe('TradingView screener (america, crypto, forex, ...)'),
  exchange: z.string().default('NASDAQ').describe('Exchange the ticker trades on'),
  interval: z.enum(INTERVAL_NAMES).optional().describe('Single interval; all intervals when omitted'),
});

export const ResolutionSchema = z.enum(['1', '5', '15', '30', '60', 'D', 'W', 'M']);

export const PatternSchema = TickerSchema.extend({
  resolution: ResolutionSchema.default('D').describe('Candle resolution'),
});

export const CandlesSchema = TickerSchema.extend({
  resolution: ResolutionSchema.default('D').describe('Candle resolution'),
  from: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).describe('Start date (YYYY-MM-DD)'),
  to: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional().describe('End date (YYYY-MM-DD), defaults to today'),
});
