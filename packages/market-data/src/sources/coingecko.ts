// CoinGecko coin views and potential returns

import type { VendorClient } from '../client.js';
import { UpstreamFormatError } from '../errors.js';
import { CoinMarketsSchema, CoinSchema, SimplePriceSchema, type Coin } from '../schemas/coingecko.js';
import { keyValueTable, type Cell, type Table } from '../table.js';
import { CacheTTL } from '../vendors.js';

export type { Coin };

export type AthCurrency = 'usd' | 'btc';

export async function getCoin(client: VendorClient, id: string): Promise<Coin> {
  return client.getJson(
    `coins/${encodeURIComponent(id.toLowerCase())}`,
    {
      localization: false,
      tickers: false,
      market_data: true,
      community_data: true,
      developer_data: true,
      sparkline: false,
    },
    CoinSchema,
    { cacheTtl: CacheTTL.SHORT },
  );
}

function stripHtml(text: string): string {
  return text.replace(/<[^>]*>?/gm, '').replace(/\s+/g, ' ').trim();
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max - 3) + '...' : text;
}

function marketData(coin: Coin) {
  if (!coin.market_data) throw new UpstreamFormatError('CoinGecko', `no market data for ${coin.id}`);
  return coin.market_data;
}

export function coinInfo(coin: Coin): Table {
  const description = stripHtml(coin.description?.en ?? '');
  return keyValueTable('Basic Coin Information', [
    ['ID', coin.id],
    ['Name', coin.name],
    ['Symbol', coin.symbol.toUpperCase()],
    ['Hashing Algorithm', coin.hashing_algorithm ?? null],
    ['Categories', coin.categories.join(', ') || null],
    ['Description', description ? truncate(description, 300) : null],
    ['Genesis Date', coin.genesis_date ?? null],
  ]);
}

export function coinMarket(coin: Coin): Table {
  const m = marketData(coin);
  return keyValueTable('Market Data', [
    ['Market Cap Rank', coin.market_cap_rank ?? null],
    ['Current Price (USD)', m.current_price.usd ?? null],
    ['Current Price (BTC)', m.current_price.btc ?? null],
    ['Market Cap (USD)', m.market_cap.usd ?? null],
    ['Total Volume (USD)', m.total_volume.usd ?? null],
    ['High 24h (USD)', m.high_24h.usd ?? null],
    ['Low 24h (USD)', m.low_24h.usd ?? null],
    ['Circulating Supply', m.circulating_supply ?? null],
    ['Total Supply', m.total_supply ?? null],
    ['Max Supply', m.max_supply ?? null],
    ['Price Change 24h (%)', m.price_change_percentage_24h ?? null],
    ['Price Change 7d (%)', m.price_change_percentage_7d ?? null],
    ['Price Change 30d (%)', m.price_change_percentage_30d ?? null],
  ]);
}

export function coinAllTimeHigh(coin: Coin, currency: AthCurrency): Table {
  const m = marketData(coin);
  const unit = currency.toUpperCase();
  return keyValueTable('Coin Highs', [
    [`Current Price (${unit})`, m.current_price[currency] ?? null],
    [`All Time High (${unit})`, m.ath[currency] ?? null],
    ['All Time High Date', m.ath_date[currency]?.slice(0, 10) ?? null],
    ['% From All Time High', m.ath_change_percentage[currency] ?? null],
  ]);
}

export function coinAllTimeLow(coin: Coin, currency: AthCurrency): Table {
  const m = marketData(coin);
  const unit = currency.toUpperCase();
  return keyValueTable('Coin Lows', [
    [`Current Price (${unit})`, m.current_price[currency] ?? null],
    [`All Time Low (${unit})`, m.atl[currency] ?? null],
    ['All Time Low Date', m.atl_date[currency]?.slice(0, 10) ?? null],
    ['% From All Time Low', m.atl_change_percentage[currency] ?? null],
  ]);
}

export function coinWebsites(coin: Coin): Table {
  const links = coin.links;
  const entries: Array<[string, string]> = [];
  for (const url of links?.homepage ?? []) entries.push(['Homepage', url]);
  for (const url of links?.official_forum_url ?? []) entries.push(['Forum', url]);
  for (const url of links?.chat_url ?? []) entries.push(['Chat', url]);
  for (const url of links?.announcement_url ?? []) entries.push(['Announcement', url]);
  for (const url of links?.repos_url?.github ?? []) entries.push(['GitHub', url]);
  for (const url of links?.repos_url?.bitbucket ?? []) entries.push(['Bitbucket', url]);
  return keyValueTable('Websites for Loaded Coin', entries);
}

export function coinSocialMedia(coin: Coin): Table {
  const links = coin.links;
  const community = coin.community_data;
  const entries: Array<[string, Cell]> = [];
  if (links?.twitter_screen_name) entries.push(['Twitter', `https://twitter.com/${links.twitter_screen_name}`]);
  if (links?.facebook_username) entries.push(['Facebook', `https://www.facebook.com/${links.facebook_username}`]);
  if (links?.telegram_channel_identifier) entries.push(['Telegram', `https://t.me/${links.telegram_channel_identifier}`]);
  if (links?.subreddit_url) entries.push(['Reddit', links.subreddit_url]);
  entries.push(['Twitter Followers', community?.twitter_followers ?? null]);
  entries.push(['Reddit Subscribers', community?.reddit_subscribers ?? null]);
  entries.push(['Telegram Members', community?.telegram_channel_user_count ?? null]);
  return keyValueTable('Social Media for Loaded Coin', entries);
}

export function coinDeveloperData(coin: Coin): Table {
  const d = coin.developer_data;
  return keyValueTable('Developers Data for Loaded Coin', [
    ['Forks', d?.forks ?? null],
    ['Stars', d?.stars ?? null],
    ['Subscribers', d?.subscribers ?? null],
    ['Total Issues', d?.total_issues ?? null],
    ['Closed Issues', d?.closed_issues ?? null],
    ['Pull Requests Merged', d?.pull_requests_merged ?? null],
    ['Pull Request Contributors', d?.pull_request_contributors ?? null],
    ['Commits (4 weeks)', d?.commit_count_4_weeks ?? null],
  ]);
}

export function coinScores(coin: Coin): Table {
  return keyValueTable('Different Scores for Loaded Coin', [
    ['CoinGecko Rank', coin.coingecko_rank ?? null],
    ['CoinGecko Score', coin.coingecko_score ?? null],
    ['Developer Score', coin.developer_score ?? null],
    ['Community Score', coin.community_score ?? null],
    ['Liquidity Score', coin.liquidity_score ?? null],
    ['Public Interest Score', coin.public_interest_score ?? null],
    ['Sentiment Votes Up (%)', coin.sentiment_votes_up_percentage ?? null],
    ['Sentiment Votes Down (%)', coin.sentiment_votes_down_percentage ?? null],
  ]);
}

export function coinBlockchainExplorers(coin: Coin): Table {
  const sites = coin.links?.blockchain_site ?? [];
  return keyValueTable(
    'Blockchain URLs',
    sites.map((url, i) => [`Explorer ${i + 1}`, url] as const),
  );
}

// ── Potential returns ─────────────────────────────────────────────

export interface PotentialReturnsOptions {
  /** Compare against this coin's market cap */
  vs?: string;
  /** Compare against each of the top N coins by market cap */
  top?: number;
  /** Target price for the main coin */
  price?: number;
}

export const POTENTIAL_RETURNS_COLUMNS = [
  'Coin',
  'Current Price ($)',
  'Current Market Cap ($)',
  'Potential Price ($)',
  'Potential Market Cap ($)',
  'Change (%)',
];

/** Percentage change from `previous` to `current` */
export function calcChange(current: number, previous: number): number {
  return ((current - previous) / previous) * 100;
}

export async function coinPotentialReturns(
  client: VendorClient,
  mainCoin: string,
  options: PotentialReturnsOptions,
): Promise<Table> {
  const title = 'Potential Coin Returns';
  const main = mainCoin.toLowerCase();

  if (options.top !== undefined && options.top > 0) {
    const prices = await client.getJson(
      'simple/price',
      { ids: main, vs_currencies: 'usd', include_market_cap: true },
      SimplePriceSchema,
      { cacheTtl: CacheTTL.REALTIME },
    );
    const mainData = requirePrice(prices, main);
    const top = await client.getJson(
      'coins/markets',
      { vs_currency: 'usd', order: 'market_cap_desc', per_page: options.top, page: 1 },
      CoinMarketsSchema,
      { cacheTtl: CacheTTL.REALTIME },
    );
    const rows: Cell[][] = [];
    for (const coin of top) {
      if (coin.market_cap == null) continue;
      const change = calcChange(coin.market_cap, mainData.usd_market_cap);
      rows.push([coin.id, mainData.usd, mainData.usd_market_cap, mainData.usd * (1 + change / 100), coin.market_cap, change]);
    }
    return { title, columns: POTENTIAL_RETURNS_COLUMNS, rows };
  }

  if (options.vs) {
    const vs = options.vs.toLowerCase();
    const prices = await client.getJson(
      'simple/price',
      { ids: `${main},${vs}`, vs_currencies: 'usd', include_market_cap: true },
      SimplePriceSchema,
      { cacheTtl: CacheTTL.REALTIME },
    );
    const mainData = requirePrice(prices, main);
    const vsData = requirePrice(prices, vs);
    const change = calcChange(vsData.usd_market_cap, mainData.usd_market_cap);
    return {
      title,
      columns: POTENTIAL_RETURNS_COLUMNS,
      rows: [[main, mainData.usd, mainData.usd_market_cap, mainData.usd * (1 + change / 100), vsData.usd_market_cap, change]],
    };
  }

  if (options.price !== undefined && options.price > 0) {
    const prices = await client.getJson(
      'simple/price',
      { ids: main, vs_currencies: 'usd', include_market_cap: true },
      SimplePriceSchema,
      { cacheTtl: CacheTTL.REALTIME },
    );
    const mainData = requirePrice(prices, main);
    const targetCap = (mainData.usd_market_cap * options.price) / mainData.usd;
    const change = calcChange(targetCap, mainData.usd_market_cap);
    return {
      title,
      columns: POTENTIAL_RETURNS_COLUMNS,
      rows: [[main, mainData.usd, mainData.usd_market_cap, mainData.usd * (1 + change / 100), targetCap, change]],
    };
  }

  return { title, columns: POTENTIAL_RETURNS_COLUMNS, rows: [] };
}

function requirePrice(
  prices: Record<string, { usd: number; usd_market_cap: number }>,
  id: string,
): { usd: number; usd_market_cap: number } {
  const entry = prices[id];
  if (!entry) throw new UpstreamFormatError('CoinGecko', `no price data for "${id}"`);
  return entry;
}
