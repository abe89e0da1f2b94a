// zod coercions from raw command-line strings

import { z } from 'zod';

const INT = /^[+-]?\d+$/;
const NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export const intList = z.string().transform((raw, ctx) => {
  const values: number[] = [];
  for (const part of raw.split(',')) {
    const token = part.trim();
    if (!INT.test(token)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid int value: '${token}'` });
      return z.NEVER;
    }
    values.push(Number(token));
  }
  return values;
});

export const positiveIntList = intList.refine(values => values.every(v => v > 0), {
  message: 'every value must be a positive integer',
});

function integer(check: (n: number) => boolean, message: string) {
  return z
    .string()
    .regex(INT, { message: 'expected an integer' })
    .transform(Number)
    .refine(check, { message });
}

export const positiveInt = integer(n => n > 0, 'must be a positive integer');

export const nonNegativeInt = integer(n => n >= 0, 'must be a non-negative integer');

export const positiveNumber = z
  .string()
  .regex(NUMBER, { message: 'expected a number' })
  .transform(Number)
  .refine(n => Number.isFinite(n) && n > 0, { message: 'must be a positive number' });

export const text = z.string().trim().min(1, { message: 'must not be empty' });

export const ticker = z
  .string()
  .regex(/^[A-Za-z0-9.^=-]+$/, { message: 'not a ticker symbol' })
  .transform(s => s.toUpperCase());

export const tickerList = z
  .string()
  .transform(raw => raw.split(',').map(s => s.trim()).filter(Boolean))
  .pipe(z.array(ticker));

function utcMidnight(s: string): Date {
  return new Date(`${s}T00:00:00Z`);
}

export const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, { message: 'expected a date as YYYY-MM-DD' })
  // Date rolls 2023-02-31 over into March; the round trip must match
  .refine(
    s => {
      const d = utcMidnight(s);
      return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === s;
    },
    { message: 'not a valid calendar date' },
  )
  .transform(utcMidnight);

export function choice<const T extends readonly [string, ...string[]]>(values: T) {
  return z.enum(values);
}

export const flag = z.boolean().default(false);

// ── Shared --export option ───────────────────────────────────────

export const EXPORT_FORMATS = ['csv', 'json'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const exportFormat = z.enum(EXPORT_FORMATS).optional();

export const EXPORT_FLAG = {
  flag: '--export',
  help: 'export the result to a file (csv or json)',
  metavar: '{csv,json}',
} as const;
