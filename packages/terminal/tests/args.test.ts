import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { ArgumentError, defineArgs, parseArgs, usage } from '../src/args/parser.js';
import {
  EXPORT_FLAG,
  exportFormat,
  flag,
  intList,
  isoDate,
  nonNegativeInt,
  positiveIntList,
  positiveNumber,
  ticker,
  tickerList,
} from '../src/args/types.js';

const EMA = defineArgs({
  prog: 'ema',
  description: 'Exponential moving average.',
  schema: z.object({
    length: positiveIntList.default('20,50'),
    offset: nonNegativeInt.default('0'),
    quarter: flag,
    export: exportFormat,
  }),
  flags: {
    length: { flag: '--length', alias: '-l', help: 'window lengths' },
    offset: { flag: '--offset', alias: '-o', help: 'offset in periods' },
    quarter: { flag: '--quarter', alias: '-q', help: 'quarterly data', switch: true },
    export: EXPORT_FLAG,
  },
});

const LOAD = defineArgs({
  prog: 'load',
  description: 'Load a ticker.',
  schema: z.object({ ticker, start: isoDate.optional() }),
  flags: {
    ticker: { flag: '--ticker', alias: '-t', help: 'ticker' },
    start: { flag: '--start', alias: '-s', help: 'start date' },
  },
});

function strictError(tokens: string[], args: typeof EMA | typeof LOAD = EMA): string {
  try {
    if (args === EMA) parseArgs(EMA, tokens, { strict: true });
    else parseArgs(LOAD, tokens, { strict: true });
  } catch (err) {
    if (err instanceof ArgumentError) return err.message;
    throw err;
  }
  throw new Error('expected an ArgumentError');
}

describe('coercions', () => {
  it('parses integer lists', () => {
    expect(intList.parse('20,50')).toEqual([20, 50]);
    expect(intList.safeParse('20,abc').success).toBe(false);
  });

  it('parses positive numbers and tickers', () => {
    expect(positiveNumber.parse('2.5')).toBe(2.5);
    expect(positiveNumber.safeParse('0').success).toBe(false);
    expect(ticker.parse('brk.b')).toBe('BRK.B');
    expect(tickerList.parse('msft, goog')).toEqual(['MSFT', 'GOOG']);
  });

  it('parses ISO dates at UTC midnight', () => {
    expect(isoDate.parse('2023-01-01').toISOString()).toBe('2023-01-01T00:00:00.000Z');
    expect(isoDate.safeParse('yesterday').success).toBe(false);
  });

  it('rejects dates that do not exist', () => {
    expect(isoDate.safeParse('2023-02-31').success).toBe(false);
    expect(isoDate.safeParse('2023-13-01').success).toBe(false);
    expect(isoDate.parse('2024-02-29').toISOString()).toBe('2024-02-29T00:00:00.000Z');
  });
});

describe('parseArgs', () => {
  it('applies defaults', () => {
    expect(parseArgs(EMA, [], { strict: true })).toEqual({ length: [20, 50], offset: 0, quarter: false });
  });

  it('reads long flags, aliases and --flag=value', () => {
    expect(parseArgs(EMA, ['-l', '10,30', '--offset=2', '-q', '--export', 'json'], { strict: true })).toEqual({
      length: [10, 30],
      offset: 2,
      quarter: true,
      export: 'json',
    });
  });

  it('rejects a list with a non-integer entry', () => {
    expect(strictError(['--length', '20,abc'])).toBe("ema: argument -l/--length: invalid value '20,abc' (invalid int value: 'abc')");
  });

  it('passes a negative number to validation', () => {
    expect(strictError(['--length', '10,30', '--offset', '-1'])).toBe(
      "ema: argument -o/--offset: invalid value '-1' (must be a non-negative integer)",
    );
  });

  it('rejects unknown flags and positional tokens', () => {
    expect(strictError(['--bogus'])).toBe('ema: unrecognized argument: --bogus');
    expect(strictError(['AAPL'])).toBe('ema: unexpected positional argument: AAPL');
  });

  it('rejects a missing value', () => {
    expect(strictError(['-o'])).toBe('ema: argument -o/--offset: expected one argument');
    expect(strictError(['-o', '--quarter'])).toBe('ema: argument -o/--offset: expected one argument');
  });

  it('rejects repeated flags', () => {
    expect(strictError(['-l', '10', '--length', '20'])).toBe('ema: argument -l/--length: may only be given once');
  });

  it('rejects a value given to a switch', () => {
    expect(strictError(['--quarter=yes'])).toBe("ema: argument -q/--quarter: ignored explicit argument 'yes'");
  });

  it('restricts --export to csv and json', () => {
    expect(strictError(['--export', 'xlsx'])).toBe(
      "ema: argument --export: invalid value 'xlsx' (Invalid enum value. Expected 'csv' | 'json', received 'xlsx')",
    );
  });

  it('requires options without a default', () => {
    expect(strictError([], LOAD)).toBe('load: the following argument is required: -t/--ticker');
    expect(parseArgs(LOAD, ['-t', 'aapl'], { strict: true })).toEqual({ ticker: 'AAPL' });
  });

  it('names the flag when a date does not exist', () => {
    expect(strictError(['-t', 'aapl', '-s', '2023-02-31'], LOAD)).toBe(
      "load: argument -s/--start: invalid value '2023-02-31' (not a valid calendar date)",
    );
  });

  it('warns and returns null outside strict mode', () => {
    const warn = vi.fn();
    const logged: string[] = [];
    const logger = {
      debug: () => undefined,
      info: () => undefined,
      warn: (message: string) => logged.push(message),
      error: () => undefined,
    };

    expect(parseArgs(EMA, ['--offset', '-1'], { warn, logger })).toBeNull();
    expect(warn).toHaveBeenCalledWith("ema: argument -o/--offset: invalid value '-1' (must be a non-negative integer)");
    expect(logged).toEqual(["ema: argument -o/--offset: invalid value '-1' (must be a non-negative integer)"]);
  });

  it('prints usage for -h and returns null', () => {
    const print = vi.fn();
    expect(parseArgs(EMA, ['-l', '5', '-h'], { print })).toBeNull();
    expect(print).toHaveBeenCalledWith(usage(EMA));
  });
});

describe('usage', () => {
  it('lists every flag with its help', () => {
    expect(usage(EMA).split('\n')).toEqual([
      'usage: ema [-h] [-l LENGTH] [-o OFFSET] [-q] [--export {csv,json}]',
      '',
      'Exponential moving average.',
      '',
      'optional arguments:',
      '  -h, --help           show this help message',
      '  -l, --length LENGTH  window lengths',
      '  -o, --offset OFFSET  offset in periods',
      '  -q, --quarter        quarterly data',
      '  --export {csv,json}  export the result to a file (csv or json)',
    ]);
  });
});
