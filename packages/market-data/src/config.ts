// Market data configuration — read from the environment once, validated with zod,
// then passed explicitly to every client

import { z } from 'zod';

const optionalKey = z
  .string()
  .trim()
  .optional()
  .transform(v => (v ? v : undefined));

export const MarketDataEnvSchema = z.object({
  FINNHUB_API_KEY: optionalKey,
  FINBRAIN_API_KEY: optionalKey,
  ETHGASSTATION_API_KEY: optionalKey,
  MARKETSHELL_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  MARKETSHELL_RATE_LIMIT: z.coerce.number().int().positive().default(120),
  MARKETSHELL_CACHE_TTL: z.coerce.number().int().nonnegative().default(300),
});

export interface MarketDataConfig {
  finnhubApiKey?: string;
  finbrainApiKey?: string;
  ethGasStationApiKey?: string;
  /** Per-request timeout in ms */
  timeoutMs: number;
  /** Requests per minute, per vendor client */
  rateLimit: number;
  /** Default response cache TTL in seconds (0 disables caching) */
  cacheTtl: number;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function loadMarketDataConfig(env: NodeJS.ProcessEnv = process.env): MarketDataConfig {
  const parsed = MarketDataEnvSchema.safeParse(env);
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error));

  const e = parsed.data;
  return {
    finnhubApiKey: e.FINNHUB_API_KEY,
    finbrainApiKey: e.FINBRAIN_API_KEY,
    ethGasStationApiKey: e.ETHGASSTATION_API_KEY,
    timeoutMs: e.MARKETSHELL_HTTP_TIMEOUT_MS,
    rateLimit: e.MARKETSHELL_RATE_LIMIT,
    cacheTtl: e.MARKETSHELL_CACHE_TTL,
  };
}
