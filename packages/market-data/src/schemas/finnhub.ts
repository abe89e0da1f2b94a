import { z } from 'zod';

export const CandleResponseSchema = z.discriminatedUnion('s', [
  z.object({
    s: z.literal('ok'),
    t: z.array(z.number()),
    o: z.array(z.number()),
    h: z.array(z.number()),
    l: z.array(z.number()),
    c: z.array(z.number()),
    v: z.array(z.number()),
  }),
  z.object({ s: z.literal('no_data') }),
]);

export const PatternScanSchema = z.object({
  points: z.array(
    z.object({
      patternname: z.string(),
      patterntype: z.string(),
      status: z.string().nullish(),
      entry: z.number().nullish(),
      stoploss: z.number().nullish(),
      profit1: z.number().nullish(),
      atime: z.number().nullish(),
      dtime: z.number().nullish(),
    }),
  ),
});
