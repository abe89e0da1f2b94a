import { readFileSync } from 'node:fs';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { VendorClient } from '../src/client.js';
import { CoinSchema } from '../src/schemas/coingecko.js';
import {
  calcChange,
  coinAllTimeHigh,
  coinAllTimeLow,
  coinBlockchainExplorers,
  coinInfo,
  coinMarket,
  coinPotentialReturns,
  coinSocialMedia,
  coinWebsites,
  getCoin,
} from '../src/sources/coingecko.js';

const raw: unknown = JSON.parse(readFileSync(new URL('./fixtures/coin-testcoin.json', import.meta.url), 'utf8'));
const coin = CoinSchema.parse(raw);

function jsonResponse(body: unknown) {
  return { ok: true, json: async () => body };
}

describe('CoinGecko coin views', () => {
  it('summarises basic information', () => {
    const table = coinInfo(coin);
    expect(table.title).toBe('Basic Coin Information');
    expect(table.rows).toEqual([
      ['ID', 'testcoin'],
      ['Name', 'Testcoin'],
      ['Symbol', 'TST'],
      ['Hashing Algorithm', 'SHA-256'],
      ['Categories', 'Layer 1'],
      ['Description', 'Testcoin is a made-up coin.'],
      ['Genesis Date', '2020-01-03'],
    ]);
  });

  it('truncates long descriptions to 300 characters', () => {
    const long = CoinSchema.parse({ id: 'x', symbol: 'x', name: 'X', description: { en: 'a'.repeat(400) } });
    const description = coinInfo(long).rows[5]?.[1];
    expect(description).toBe('a'.repeat(297) + '...');
  });

  it('reports market data with missing values as null', () => {
    const rows = coinMarket(coin).rows;
    expect(rows).toContainEqual(['Market Cap Rank', 42]);
    expect(rows).toContainEqual(['Current Price (BTC)', 0.0001]);
    expect(rows).toContainEqual(['Max Supply', null]);
  });

  it('reports all time high and low in the requested currency', () => {
    expect(coinAllTimeHigh(coin, 'btc')).toEqual({
      title: 'Coin Highs',
      columns: ['Metric', 'Value'],
      rows: [
        ['Current Price (BTC)', 0.0001],
        ['All Time High (BTC)', 0.0005],
        ['All Time High Date', '2021-04-01'],
        ['% From All Time High', -80],
      ],
    });
    expect(coinAllTimeLow(coin, 'usd').rows).toEqual([
      ['Current Price (USD)', 2.5],
      ['All Time Low (USD)', 0.5],
      ['All Time Low Date', '2020-03-12'],
      ['% From All Time Low', 400],
    ]);
  });

  it('lists websites without empty entries', () => {
    expect(coinWebsites(coin).rows).toEqual([
      ['Homepage', 'https://testcoin.example'],
      ['Chat', 'https://chat.testcoin.example'],
      ['GitHub', 'https://github.com/testcoin/core'],
    ]);
  });

  it('lists social media links and audience sizes', () => {
    expect(coinSocialMedia(coin).rows).toEqual([
      ['Twitter', 'https://twitter.com/testcoin'],
      ['Reddit', 'https://www.reddit.com/r/testcoin/'],
      ['Twitter Followers', 1200],
      ['Reddit Subscribers', 300],
      ['Telegram Members', null],
    ]);
  });

  it('numbers blockchain explorers', () => {
    expect(coinBlockchainExplorers(coin).rows).toEqual([
      ['Explorer 1', 'https://explorer.testcoin.example'],
      ['Explorer 2', 'https://scan.testcoin.example'],
    ]);
  });
});

describe('CoinGecko requests', () => {
  const mockFetch = vi.fn();
  const client = new VendorClient({ name: 'CoinGecko', baseUrl: 'https://api.coingecko.com/api/v3', cacheTtl: 0 });

  beforeEach(() => {
    vi.stubGlobal('fetch', mockFetch);
    mockFetch.mockReset();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('fetches a coin by lower-cased id', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(raw));

    const result = await getCoin(client, 'TestCoin');

    const url = new URL(mockFetch.mock.calls[0][0]);
    expect(url.pathname).toBe('/api/v3/coins/testcoin');
    expect(url.searchParams.get('localization')).toBe('false');
    expect(url.searchParams.get('developer_data')).toBe('true');
    expect(result.name).toBe('Testcoin');
  });

  it('computes percentage change', () => {
    expect(calcChange(150, 100)).toBe(50);
    expect(calcChange(50, 100)).toBe(-50);
  });

  it('compares market cap against another coin', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        testcoin: { usd: 2, usd_market_cap: 100 },
        bigcoin: { usd: 50, usd_market_cap: 1000 },
      }),
    );

    const table = await coinPotentialReturns(client, 'testcoin', { vs: 'bigcoin' });

    const url = new URL(mockFetch.mock.calls[0][0]);
    expect(url.searchParams.get('ids')).toBe('testcoin,bigcoin');
    expect(table.rows).toEqual([['testcoin', 2, 100, 20, 1000, 900]]);
  });

  it('compares against each of the top coins, skipping those without a market cap', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ testcoin: { usd: 2, usd_market_cap: 100 } }))
      .mockResolvedValueOnce(
        jsonResponse([
          { id: 'bigcoin', symbol: 'big', name: 'Bigcoin', current_price: 50, market_cap: 1000 },
          { id: 'ghostcoin', symbol: 'gst', name: 'Ghostcoin', current_price: null, market_cap: null },
        ]),
      );

    const table = await coinPotentialReturns(client, 'testcoin', { top: 2 });

    expect(new URL(mockFetch.mock.calls[1][0]).searchParams.get('per_page')).toBe('2');
    expect(table.rows).toEqual([['bigcoin', 2, 100, 20, 1000, 900]]);
  });

  it('derives the market cap for a target price', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ testcoin: { usd: 2, usd_market_cap: 100 } }));

    const table = await coinPotentialReturns(client, 'testcoin', { price: 4 });

    expect(table.rows).toEqual([['testcoin', 2, 100, 4, 200, 100]]);
  });

  it('returns no rows without a comparison', async () => {
    const table = await coinPotentialReturns(client, 'testcoin', {});
    expect(table.rows).toEqual([]);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('fails when the coin has no price', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({}));

    await expect(coinPotentialReturns(client, 'testcoin', { price: 4 }))
      .rejects.toThrow('CoinGecko: no price data for "testcoin"');
  });
});
