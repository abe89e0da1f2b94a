// Per-command argument parser — flags are declared beside a zod object
// that coerces and validates the raw tokens

import type { z } from 'zod';
import { silentLogger, type Logger } from '../logger.js';

export class ArgumentError extends Error {
  readonly prog: string;
  readonly token?: string;

  constructor(prog: string, message: string, token?: string) {
    super(`${prog}: ${message}`);
    this.name = 'ArgumentError';
    this.prog = prog;
    this.token = token;
  }
}

export interface FlagSpec {
  flag: `--${string}`;
  alias?: `-${string}`;
  help: string;
  /** Takes no value; the schema field should be a boolean */
  switch?: boolean;
  metavar?: string;
}

export interface CommandArgs<Shape extends z.ZodRawShape> {
  prog: string;
  description: string;
  schema: z.ZodObject<Shape>;
  flags: { readonly [K in keyof Shape]: FlagSpec };
}

export type ParsedArgs<Shape extends z.ZodRawShape> = z.output<z.ZodObject<Shape>>;

export function defineArgs<Shape extends z.ZodRawShape>(spec: CommandArgs<Shape>): CommandArgs<Shape> {
  return spec;
}

export interface ParseSettings {
  /** Throw instead of warning and returning null */
  strict?: boolean;
  /** Receives usage text for -h/--help and warnings in non-strict mode */
  print?: (text: string) => void;
  warn?: (message: string) => void;
  logger?: Logger;
}

const NUMERIC = /^-?(\d+\.?\d*|\.\d+)([,.]\d+)*$/;

function label(spec: FlagSpec): string {
  return spec.alias ? `${spec.alias}/${spec.flag}` : spec.flag;
}

export function usage<Shape extends z.ZodRawShape>(args: CommandArgs<Shape>): string {
  const specs: FlagSpec[] = Object.values(args.flags);
  const metavar = (s: FlagSpec) => s.metavar ?? s.flag.slice(2).toUpperCase().replace(/-/g, '_');
  const synopsis = specs
    .map(s => `[${s.alias ?? s.flag}${s.switch ? '' : ' ' + metavar(s)}]`)
    .join(' ');
  const lines = [`usage: ${args.prog} [-h] ${synopsis}`.trimEnd(), '', args.description, '', 'optional arguments:'];
  const rows: Array<[string, string]> = [['-h, --help', 'show this help message'], ...specs.map((s): [string, string] => {
    const names = s.alias ? `${s.alias}, ${s.flag}` : s.flag;
    return [s.switch ? names : `${names} ${metavar(s)}`, s.help];
  })];
  const width = Math.max(...rows.map(([n]) => n.length));
  for (const [names, help] of rows) lines.push(`  ${names.padEnd(width)}  ${help}`);
  return lines.join('\n');
}

function tokenize<Shape extends z.ZodRawShape>(args: CommandArgs<Shape>, tokens: readonly string[]) {
  const lookup = new Map<string, [string, FlagSpec]>();
  for (const [key, spec] of Object.entries<FlagSpec>(args.flags)) {
    lookup.set(spec.flag, [key, spec]);
    if (spec.alias) lookup.set(spec.alias, [key, spec]);
  }

  const raw: Record<string, string | boolean> = {};
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i] ?? '';
    let name = token;
    let inline: string | undefined;
    const eq = token.indexOf('=');
    if (token.startsWith('--') && eq > 0) {
      name = token.slice(0, eq);
      inline = token.slice(eq + 1);
    }

    const entry = lookup.get(name);
    if (!entry) {
      if (token.startsWith('-') && !NUMERIC.test(token)) {
        throw new ArgumentError(args.prog, `unrecognized argument: ${token}`, token);
      }
      throw new ArgumentError(args.prog, `unexpected positional argument: ${token}`, token);
    }

    const [key, spec] = entry;
    if (key in raw) {
      throw new ArgumentError(args.prog, `argument ${label(spec)}: may only be given once`, token);
    }

    if (spec.switch) {
      if (inline !== undefined) {
        throw new ArgumentError(args.prog, `argument ${label(spec)}: ignored explicit argument '${inline}'`, token);
      }
      raw[key] = true;
      continue;
    }

    if (inline !== undefined) {
      raw[key] = inline;
      continue;
    }
    const value = tokens[i + 1];
    if (value === undefined || (value.startsWith('-') && !NUMERIC.test(value))) {
      throw new ArgumentError(args.prog, `argument ${label(spec)}: expected one argument`, token);
    }
    raw[key] = value;
    i++;
  }
  return raw;
}

function validate<Shape extends z.ZodRawShape>(
  args: CommandArgs<Shape>,
  raw: Record<string, string | boolean>,
): ParsedArgs<Shape> {
  const parsed = args.schema.safeParse(raw);
  if (parsed.success) return parsed.data;

  const issue = parsed.error.issues[0];
  const key = issue?.path[0];
  const spec = typeof key === 'string' ? Object.entries<FlagSpec>(args.flags).find(([k]) => k === key)?.[1] : undefined;
  if (!issue || !spec || typeof key !== 'string') {
    throw new ArgumentError(args.prog, issue?.message ?? 'invalid arguments');
  }
  const value = raw[key];
  if (value === undefined) {
    throw new ArgumentError(args.prog, `the following argument is required: ${label(spec)}`);
  }
  const token = String(value);
  throw new ArgumentError(args.prog, `argument ${label(spec)}: invalid value '${token}' (${issue.message})`, token);
}

/**
 * Parse `tokens` against `args`. Returns null when the command should not run:
 * after printing help, or (non-strict) after reporting an ArgumentError.
 */
export function parseArgs<Shape extends z.ZodRawShape>(
  args: CommandArgs<Shape>,
  tokens: readonly string[],
  settings: ParseSettings = {},
): ParsedArgs<Shape> | null {
  const logger = settings.logger ?? silentLogger;

  if (tokens.includes('-h') || tokens.includes('--help')) {
    (settings.print ?? console.log)(usage(args));
    return null;
  }

  try {
    return validate(args, tokenize(args, tokens));
  } catch (err) {
    if (settings.strict || !(err instanceof ArgumentError)) throw err;
    logger.warn(err.message, { prog: err.prog, token: err.token });
    (settings.warn ?? console.error)(err.message);
    return null;
  }
}
