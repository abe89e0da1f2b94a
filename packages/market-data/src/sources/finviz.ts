import { writeFile } from 'node:fs/promises';
import type { VendorClient } from '../client.js';
import { UpstreamFormatError } from '../errors.js';

/** Download the chart for `ticker` to `destination`; resolves the path written. */
export async function downloadChart(client: VendorClient, ticker: string, destination: string): Promise<string> {
  const image = await client.getBinary('chart.ashx', {
    t: ticker.toUpperCase(),
    ty: 'c',
    ta: 1,
    p: 'd',
    s: 'l',
  });
  if (image.byteLength === 0) throw new UpstreamFormatError(client.name, `empty chart image for ${ticker}`);
  await writeFile(destination, image);
  return destination;
}
