import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CandlesSchema, PatternSchema, RecommendationSchema, TickerSchema } from '../schemas/tools.js';
import { technicalSummary } from '../sources/finbrain.js';
import { candles, patternRecognition } from '../sources/finnhub.js';
import { recommendation } from '../sources/tradingview.js';
import type { VendorClients } from '../vendors.js';
import { respond } from './response.js';

export function registerTechnicalTools(server: McpServer, clients: VendorClients) {
  server.tool(
    'tradingview_recommendation',
    'TradingView buy/sell recommendation per interval, split into overall, oscillators and moving averages (STRONG_SELL..STRONG_BUY).',
    RecommendationSchema.shape,
    async (params) => respond(async () => {
      const { ticker, screener, exchange, interval } = RecommendationSchema.parse(params);
      return recommendation(clients.tradingView, ticker, screener, exchange, interval ?? '');
    }),
  );

  server.tool(
    'finbrain_summary',
    'Automated technical summary report for a stock. Source: FinBrain.',
    TickerSchema.shape,
    async (params) => respond(async () => {
      const { ticker } = TickerSchema.parse(params);
      return { ticker: ticker.toUpperCase(), summary: await technicalSummary(clients.finbrain, ticker) };
    }),
  );

  server.tool(
    'finnhub_patterns',
    'Chart patterns detected for a stock (double top, triangle, ...) with entry, stop loss and target. Source: Finnhub.',
    PatternSchema.shape,
    async (params) => respond(async () => {
      const { ticker, resolution } = PatternSchema.parse(params);
      return patternRecognition(clients.finnhub, ticker, resolution);
    }),
  );

  server.tool(
    'finnhub_candles',
    'OHLCV candles for a stock between two dates. Source: Finnhub.',
    CandlesSchema.shape,
    async (params) => respond(async () => {
      const { ticker, resolution, from, to } = CandlesSchema.parse(params);
      return candles(clients.finnhub, ticker, resolution, new Date(from), to ? new Date(to) : new Date());
    }),
  );
}
