import { z } from 'zod';

export const ScanResponseSchema = z.object({
  totalCount: z.number(),
  data: z.array(
    z.object({
      s: z.string(),
      d: z.array(z.number().nullable()),
    }),
  ),
});
