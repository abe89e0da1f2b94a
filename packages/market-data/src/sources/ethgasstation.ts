import type { VendorClient } from '../client.js';
import { GasPriceSchema, type GasPrices } from '../schemas/ethgasstation.js';
import type { Table } from '../table.js';
import { CacheTTL } from '../vendors.js';

function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

export function gweiFeesTable(data: GasPrices): Table {
  return {
    title: 'Current GWEI Fees',
    columns: ['Tx Type', 'Fee (gwei)', 'Duration (min)'],
    rows: [
      ['Fastest', Math.trunc(data.fastest / 10), round1(data.fastestWait)],
      ['Fast', Math.trunc(data.fast / 10), round1(data.fastWait)],
      ['Average', Math.trunc(data.average / 10), round1(data.avgWait)],
      ['Slow', Math.trunc(data.safeLow / 10), round1(data.safeLowWait)],
    ],
  };
}

export async function gweiFees(client: VendorClient): Promise<Table> {
  const data = await client.getJson('ethgasAPI.json', {}, GasPriceSchema, { cacheTtl: CacheTTL.REALTIME });
  return gweiFeesTable(data);
}
