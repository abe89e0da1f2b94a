// ANSI helpers and diagnostics logger (no chalk dependency)

export const ANSI_CODES = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
  gray: '\x1b[90m',
} as const;

export type Color = Exclude<keyof typeof ANSI_CODES, 'reset'>;

export type Colorize = (color: Color, text: string) => string;

export function createColorizer(enabled: boolean): Colorize {
  return (color, text) => (enabled ? `${ANSI_CODES[color]}${text}${ANSI_CODES.reset}` : text);
}

// ── Logger ──────────────────────────────────────────────────────────

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };
const LEVEL_COLOR: Record<Exclude<LogLevel, 'silent'>, Color> = {
  debug: 'gray',
  info: 'green',
  warn: 'yellow',
  error: 'red',
};

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  scope: string;
  level?: LogLevel;
  color?: boolean;
  /** Defaults to stderr */
  write?: (line: string) => void;
}

export function createLogger(options: LoggerOptions): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'warn'];
  const c = createColorizer(options.color ?? false);
  const write = options.write ?? ((line: string) => process.stderr.write(line + '\n'));

  const log = (level: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): void => {
    if (LEVEL_RANK[level] < threshold) return;
    const prefix = c(LEVEL_COLOR[level], `[${options.scope}:${level.toUpperCase()}]`);
    write(data ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`);
  };

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
  };
}

export const silentLogger: Logger = createLogger({ scope: 'silent', level: 'silent' });
