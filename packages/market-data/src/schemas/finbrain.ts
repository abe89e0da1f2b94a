import { z } from 'zod';

export const TechnicalSummarySchema = z.object({
  auto: z.string(),
});
