// Root menu — loads a ticker or coin and opens the analysis sub-menus

import { coingecko, ethGasStation, finnhub } from '@marketshell/market-data';
import { z } from 'zod';
import { defineArgs } from '../args/parser.js';
import { choice, EXPORT_FLAG, exportFormat, isoDate, text, ticker } from '../args/types.js';
import { ControlSignal } from '../router/signals.js';
import type { MenuDeps } from './command.js';
import { CryptoMenu } from './crypto-menu.js';
import { DueDiligenceMenu } from './due-diligence-menu.js';
import { Menu, type HelpSection } from './menu.js';
import { describeSession, isIntraday, LOAD_INTERVALS, type LoadInterval, type StockSession } from './session.js';
import { TechnicalAnalysisMenu } from './technical-analysis-menu.js';

const RESOLUTION: Record<LoadInterval, finnhub.Resolution> = {
  '1': '1',
  '5': '5',
  '15': '15',
  '30': '30',
  '60': '60',
  '1440': 'D',
};

function oneYearBefore(date: Date): string {
  const d = new Date(date);
  d.setUTCFullYear(d.getUTCFullYear() - 1);
  return d.toISOString().slice(0, 10);
}

function loadArgs(now: () => Date) {
  return defineArgs({
    prog: 'load',
    description: 'Load a stock in order to perform analysis.',
    schema: z.object({
      ticker,
      start: isoDate.default(() => oneYearBefore(now())),
      interval: choice(LOAD_INTERVALS).default('1440'),
    }),
    flags: {
      ticker: { flag: '--ticker', alias: '-t', help: 'stock ticker' },
      start: { flag: '--start', alias: '-s', help: 'the starting date (format YYYY-MM-DD), default one year ago' },
      interval: {
        flag: '--interval',
        alias: '-i',
        help: 'intraday minutes per candle, 1440 for daily (default: 1440)',
        metavar: `{${LOAD_INTERVALS.join(',')}}`,
      },
    },
  });
}

const STOCK_REQUIRED_ARGS = (prog: string, description: string) =>
  defineArgs({ prog, description, schema: z.object({}), flags: {} });

const CRYPTO_ARGS = defineArgs({
  prog: 'crypto',
  description: 'Load a coin from CoinGecko and open the cryptocurrency menu.',
  schema: z.object({ coin: text.transform(s => s.toLowerCase()) }),
  flags: { coin: { flag: '--coin', alias: '-c', help: 'CoinGecko coin id, e.g. bitcoin' } },
});

const GWEI_ARGS = defineArgs({
  prog: 'gwei',
  description: 'Current Ethereum gas fees [EthGasStation].',
  schema: z.object({ export: exportFormat }),
  flags: { export: EXPORT_FLAG },
});

export class RootMenu extends Menu {
  protected readonly title = 'What do you want to do?';
  private session: StockSession | null = null;

  constructor(deps: MenuDeps) {
    super(deps, 'marketshell> ');
    const { clients, presenter } = deps;
    const now = deps.now ?? (() => new Date());

    this.command('load', loadArgs(now), async options => {
      const candles = await finnhub.candles(
        clients.finnhub,
        options.ticker,
        RESOLUTION[options.interval],
        options.start,
        now(),
      );
      this.session = { ticker: options.ticker, start: options.start, interval: options.interval, candles };
      const period = isIntraday(this.session) ? `Intraday ${options.interval}min` : 'Daily';
      presenter.print(
        `Loading ${period} ${options.ticker} stock with starting period ${options.start.toISOString().slice(0, 10)} for analysis.\n`,
      );
    });

    this.command('ta', STOCK_REQUIRED_ARGS('ta', 'Technical analysis of the loaded ticker.'), () => {
      const session = this.requireSession();
      return session ? this.enter(new TechnicalAnalysisMenu(this.deps, session)) : ControlSignal.CONTINUE;
    });

    this.command('dd', STOCK_REQUIRED_ARGS('dd', 'Due diligence of the loaded ticker.'), () => {
      const session = this.requireSession();
      return session ? this.enter(new DueDiligenceMenu(this.deps, session)) : ControlSignal.CONTINUE;
    });

    this.command('crypto', CRYPTO_ARGS, async options => {
      const coin = await coingecko.getCoin(clients.coingecko, options.coin);
      presenter.print(`Coin loaded: ${coin.name} (${coin.symbol.toUpperCase()})\n`);
      return this.enter(new CryptoMenu(this.deps, { id: coin.id, name: coin.name, symbol: coin.symbol }));
    });

    this.command('gwei', GWEI_ARGS, async options => {
      await this.show(await ethGasStation.gweiFees(clients.ethGasStation), 'gwei', options.export);
    });
  }

  get loaded(): StockSession | null {
    return this.session;
  }

  protected helpSections(): HelpSection[] {
    return [
      {
        title: this.session ? `Ticker: ${describeSession(this.session)}` : 'No ticker loaded',
        commands: [
          ['load', 'load a specific stock ticker for analysis [Finnhub]'],
          ['ta', 'technical analysis of the loaded ticker'],
          ['dd', 'due diligence: SEC filings and financial statements [MarketWatch]'],
          ['crypto', 'cryptocurrency due diligence [CoinGecko]'],
          ['gwei', 'current Ethereum gas fees [EthGasStation]'],
        ],
      },
    ];
  }

  private requireSession(): StockSession | null {
    if (!this.session) this.deps.presenter.print("Use 'load -t <ticker>' prior to this command!\n");
    return this.session;
  }
}
