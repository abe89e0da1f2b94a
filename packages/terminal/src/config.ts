// Terminal configuration — market data settings plus presentation switches,
// validated once at start-up and handed to every menu

import {
  ConfigError,
  formatIssues,
  loadMarketDataConfig,
  MarketDataEnvSchema,
  type MarketDataConfig,
} from '@marketshell/market-data';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './logger.js';

const boolish = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off']))
  .transform(v => v === 'true' || v === '1' || v === 'yes' || v === 'on');

export const TerminalEnvSchema = z.object({
  MARKETSHELL_USE_COLOR: boolish.optional(),
  MARKETSHELL_PLOT: boolish.default('true'),
  MARKETSHELL_EXPORT_DIR: z.string().min(1).default('exports'),
  MARKETSHELL_CHART_DIR: z.string().min(1).default('charts'),
  MARKETSHELL_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
});

export interface TerminalConfig {
  marketData: MarketDataConfig;
  useColor: boolean;
  /** Write SVG charts for indicator commands */
  plot: boolean;
  exportDir: string;
  chartDir: string;
  logLevel: LogLevel;
}

export function loadTerminalConfig(
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout.isTTY ?? false,
): TerminalConfig {
  const terminal = TerminalEnvSchema.safeParse(env);
  const marketData = MarketDataEnvSchema.safeParse(env);

  const issues = [
    ...(marketData.success ? [] : formatIssues(marketData.error)),
    ...(terminal.success ? [] : formatIssues(terminal.error)),
  ];
  if (!terminal.success || issues.length > 0) throw new ConfigError(issues);

  const t = terminal.data;
  return {
    marketData: loadMarketDataConfig(env),
    useColor: t.MARKETSHELL_USE_COLOR ?? isTTY,
    plot: t.MARKETSHELL_PLOT,
    exportDir: t.MARKETSHELL_EXPORT_DIR,
    chartDir: t.MARKETSHELL_CHART_DIR,
    logLevel: t.MARKETSHELL_LOG_LEVEL,
  };
}
