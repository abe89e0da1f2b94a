import { z } from 'zod';

// Prices are reported in tenths of gwei, waits in minutes
export const GasPriceSchema = z.object({
  fast: z.number(),
  fastest: z.number(),
  safeLow: z.number(),
  average: z.number(),
  fastWait: z.number(),
  fastestWait: z.number(),
  safeLowWait: z.number(),
  avgWait: z.number(),
});

export type GasPrices = z.output<typeof GasPriceSchema>;
