import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CoinViewSchema, PotentialReturnsSchema } from '../schemas/tools.js';
import {
  coinAllTimeHigh,
  coinAllTimeLow,
  coinBlockchainExplorers,
  coinDeveloperData,
  coinInfo,
  coinMarket,
  coinPotentialReturns,
  coinScores,
  coinSocialMedia,
  coinWebsites,
  getCoin,
} from '../sources/coingecko.js';
import { gweiFees } from '../sources/ethgasstation.js';
import type { Table } from '../table.js';
import type { VendorClients } from '../vendors.js';
import { respond } from './response.js';

export async function coinView(clients: VendorClients, params: unknown): Promise<Table> {
  const { coin, view, currency } = CoinViewSchema.parse(params);
  const data = await getCoin(clients.coingecko, coin);
  switch (view) {
    case 'info': return coinInfo(data);
    case 'market': return coinMarket(data);
    case 'ath': return coinAllTimeHigh(data, currency);
    case 'atl': return coinAllTimeLow(data, currency);
    case 'web': return coinWebsites(data);
    case 'social': return coinSocialMedia(data);
    case 'dev': return coinDeveloperData(data);
    case 'score': return coinScores(data);
    case 'bc': return coinBlockchainExplorers(data);
  }
}

export function registerCryptoTools(server: McpServer, clients: VendorClients) {
  server.tool(
    'coingecko_coin',
    'Coin due diligence from CoinGecko. Views: info, market, ath, atl (usd or btc), web, social, dev, score, bc (blockchain explorers).',
    CoinViewSchema.shape,
    async (params) => respond(() => coinView(clients, params)),
  );

  server.tool(
    'coingecko_potential_returns',
    'Potential price of a coin if it reached the market cap of another coin (vs), of each top-N coin (top), or a target price (price).',
    PotentialReturnsSchema.innerType().shape,
    async (params) => respond(async () => {
      const { coin, vs, top, price } = PotentialReturnsSchema.parse(params);
      return coinPotentialReturns(clients.coingecko, coin, { vs, top, price });
    }),
  );

  server.tool(
    'ethgas_fees',
    'Current Ethereum gas fees in gwei with expected confirmation time, from ETH Gas Station.',
    {},
    async () => respond(() => gweiFees(clients.ethGasStation)),
  );
}
