import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CompareSchema, SecFilingsSchema } from '../schemas/tools.js';
import { financialComparison, secFilings } from '../sources/marketwatch.js';
import { headRows } from '../table.js';
import type { VendorClients } from '../vendors.js';
import { respond } from './response.js';

export function registerStockTools(server: McpServer, clients: VendorClients) {
  server.tool(
    'marketwatch_sec_filings',
    'Latest SEC filings for a stock (filing date, document date, type, category, amended, link). Source: MarketWatch.',
    SecFilingsSchema.shape,
    async (params) => respond(async () => {
      const { ticker, limit } = SecFilingsSchema.parse(params);
      return headRows(await secFilings(clients.marketWatch, ticker), limit);
    }),
  );

  server.tool(
    'marketwatch_compare',
    'Compare income, balance sheet or cash flow line items across several tickers for one period. Source: MarketWatch.',
    CompareSchema.shape,
    async (params) => respond(async () => {
      const { tickers, statement, timeframe, quarter } = CompareSchema.parse(params);
      return financialComparison(clients.marketWatch, tickers, statement, timeframe, quarter);
    }),
  );
}
