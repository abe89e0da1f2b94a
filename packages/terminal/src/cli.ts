#!/usr/bin/env node
// marketshell — interactive market research terminal
//
// Usage:
//   marketshell                              interactive prompt
//   marketshell load -t AAPL/ta/rsi/quit     run a `/`-separated script, then exit

import 'dotenv/config';
import { ConfigError, createVendorClients } from '@marketshell/market-data';
import { loadTerminalConfig, type TerminalConfig } from './config.js';
import { createLogger } from './logger.js';
import { RootMenu } from './menus/root-menu.js';
import { ConsolePresenter } from './presentation/presenter.js';
import { ReadlineLineReader, ScriptedLineReader, splitScript, type LineReader } from './router/line-reader.js';

const USAGE = `marketshell — interactive market research terminal

Usage:
  marketshell                      start the interactive prompt
  marketshell <line>/<line>/...    run menu commands separated by '/', then exit
  marketshell --help               show this message

Environment (also read from .env):
  FINNHUB_API_KEY, FINBRAIN_API_KEY, ETHGASSTATION_API_KEY
  MARKETSHELL_USE_COLOR, MARKETSHELL_PLOT, MARKETSHELL_EXPORT_DIR, MARKETSHELL_CHART_DIR
  MARKETSHELL_HTTP_TIMEOUT_MS, MARKETSHELL_RATE_LIMIT, MARKETSHELL_CACHE_TTL, MARKETSHELL_LOG_LEVEL`;

async function main(argv: string[]): Promise<number> {
  if (argv[0] === '--help' || argv[0] === '-h') {
    console.log(USAGE);
    return 0;
  }

  let config: TerminalConfig;
  try {
    config = loadTerminalConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }

  const logger = createLogger({ scope: 'marketshell', level: config.logLevel, color: config.useColor });
  const presenter = new ConsolePresenter({
    useColor: config.useColor,
    plot: config.plot,
    exportDir: config.exportDir,
    chartDir: config.chartDir,
  });

  const script = splitScript(argv);
  const reader: LineReader =
    script.length > 0 ? new ScriptedLineReader(script, line => presenter.print(line)) : new ReadlineLineReader();

  const root = new RootMenu({
    config,
    clients: createVendorClients(config.marketData),
    presenter,
    reader,
    logger,
  });

  try {
    const signal = await root.run();
    logger.debug('session ended', { signal });
  } finally {
    reader.close();
  }
  presenter.print('Goodbye.');
  return 0;
}

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  },
);
