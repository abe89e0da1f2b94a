import type { VendorClient } from '../client.js';
import { TechnicalSummarySchema } from '../schemas/finbrain.js';
import { CacheTTL } from '../vendors.js';

export async function technicalSummary(client: VendorClient, ticker: string): Promise<string> {
  const data = await client.getJson(
    `technicalSummary/${encodeURIComponent(ticker.toUpperCase())}`,
    {},
    TechnicalSummarySchema,
    { cacheTtl: CacheTTL.SHORT },
  );
  return data.auto.trim();
}
