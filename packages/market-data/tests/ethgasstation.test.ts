import { describe, it, expect, vi, afterEach } from 'vitest';
import { VendorClient } from '../src/client.js';
import { loadMarketDataConfig } from '../src/config.js';
import { gweiFees, gweiFeesTable } from '../src/sources/ethgasstation.js';
import { createVendorClients } from '../src/vendors.js';

const SAMPLE = {
  fast: 305,
  fastest: 419,
  safeLow: 250,
  average: 270,
  fastWait: 0.5,
  fastestWait: 0.46,
  safeLowWait: 4.25,
  avgWait: 1.94,
};

describe('ETH Gas Station', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('converts tenths of gwei and rounds waits to one decimal', () => {
    expect(gweiFeesTable(SAMPLE)).toEqual({
      title: 'Current GWEI Fees',
      columns: ['Tx Type', 'Fee (gwei)', 'Duration (min)'],
      rows: [
        ['Fastest', 41, 0.5],
        ['Fast', 30, 0.5],
        ['Average', 27, 1.9],
        ['Slow', 25, 4.3],
      ],
    });
  });

  it('requests ethgasAPI.json with the optional key', async () => {
    const mockFetch = vi.fn().mockResolvedValue({ ok: true, json: async () => SAMPLE });
    vi.stubGlobal('fetch', mockFetch);
    const client = new VendorClient({
      name: 'EthGasStation',
      baseUrl: 'https://ethgasstation.info/api',
      cacheTtl: 0,
      credential: { param: 'api-key', value: 'test-secret', envVar: 'ETHGASSTATION_API_KEY', optional: true },
    });

    const table = await gweiFees(client);

    const url = new URL(mockFetch.mock.calls[0][0]);
    expect(url.pathname).toBe('/api/ethgasAPI.json');
    expect(url.searchParams.get('api-key')).toBe('test-secret');
    expect(table.rows[0]).toEqual(['Fastest', 41, 0.5]);
  });

  it('refetches every time when the configured cache TTL is 0', async () => {
    const mockFetch = vi.fn().mockResolvedValue({ ok: true, json: async () => SAMPLE });
    vi.stubGlobal('fetch', mockFetch);
    const clients = createVendorClients(loadMarketDataConfig({ MARKETSHELL_CACHE_TTL: '0' }));

    await gweiFees(clients.ethGasStation);
    await gweiFees(clients.ethGasStation);

    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('reuses the response within the default cache TTL', async () => {
    const mockFetch = vi.fn().mockResolvedValue({ ok: true, json: async () => SAMPLE });
    vi.stubGlobal('fetch', mockFetch);
    const clients = createVendorClients(loadMarketDataConfig({}));

    await gweiFees(clients.ethGasStation);
    await gweiFees(clients.ethGasStation);

    expect(mockFetch).toHaveBeenCalledTimes(1);
  });
});
