// Technical analysis menu — indicator studies over the loaded candles plus vendor opinions

import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { finbrain, finnhub, finviz, tailRows, tradingView } from '@marketshell/market-data';
import { z } from 'zod';
import { defineArgs, type FlagSpec } from '../args/parser.js';
import {
  choice,
  EXPORT_FLAG,
  exportFormat,
  nonNegativeInt,
  positiveInt,
  positiveIntList,
  positiveNumber,
  text,
  type ExportFormat,
} from '../args/types.js';
import * as indicators from '../indicators/index.js';
import { indicatorTable, type IndicatorColumns } from '../indicators/series.js';
import type { MenuDeps } from './command.js';
import { Menu, type HelpSection } from './menu.js';
import { describeSession, isIntraday, type StockSession } from './session.js';

const OFFSET = nonNegativeInt.default('0');
const OFFSET_FLAG: FlagSpec = { flag: '--offset', alias: '-o', help: 'offset of the indicator, in periods (default: 0)' };

function lengthFlag(fallback: string): FlagSpec {
  return { flag: '--length', alias: '-l', help: `length of the window (default: ${fallback})` };
}

function offsetOnly(prog: string, description: string) {
  return defineArgs({
    prog,
    description,
    schema: z.object({ offset: OFFSET, export: exportFormat }),
    flags: { offset: OFFSET_FLAG, export: EXPORT_FLAG },
  });
}

function singleLength(prog: string, description: string, fallback: string) {
  return defineArgs({
    prog,
    description,
    schema: z.object({ length: positiveInt.default(fallback), offset: OFFSET, export: exportFormat }),
    flags: { length: lengthFlag(fallback), offset: OFFSET_FLAG, export: EXPORT_FLAG },
  });
}

function movingAverage(prog: string, description: string) {
  return defineArgs({
    prog,
    description,
    schema: z.object({ length: positiveIntList.default('20,50'), offset: OFFSET, export: exportFormat }),
    flags: {
      length: { flag: '--length', alias: '-l', help: 'comma separated window lengths (default: 20,50)' },
      offset: OFFSET_FLAG,
      export: EXPORT_FLAG,
    },
  });
}

// ── Command arguments ──────────────────────────────────────────────

const VIEW_ARGS = defineArgs({
  prog: 'view',
  description: 'View the daily chart with trendlines from Finviz. The image is removed before the next command.',
  schema: z.object({}),
  flags: {},
});

const SUMMARY_ARGS = defineArgs({
  prog: 'summary',
  description: 'Technical summary report provided by FinBrain.',
  schema: z.object({}),
  flags: {},
});

const RECOM_ARGS = defineArgs({
  prog: 'recom',
  description: 'Print the TradingView recommendation based on technical indicators.',
  schema: z.object({
    screener: text.default('america'),
    exchange: text.default('NASDAQ'),
    interval: choice(tradingView.INTERVAL_NAMES).optional(),
    export: exportFormat,
  }),
  flags: {
    screener: { flag: '--screener', alias: '-s', help: 'screener (default: america)' },
    exchange: { flag: '--exchange', alias: '-e', help: 'exchange (default: NASDAQ)' },
    interval: {
      flag: '--interval',
      alias: '-i',
      help: 'interval of the recommendation (default: all)',
      metavar: `{${tradingView.INTERVAL_NAMES.join(',')}}`,
    },
    export: EXPORT_FLAG,
  },
});

const RESOLUTIONS = ['1', '5', '15', '30', '60', 'D', 'W', 'M'] as const;

const PR_ARGS = defineArgs({
  prog: 'pr',
  description: 'Display pattern recognition signals on the data (Finnhub).',
  schema: z.object({ resolution: choice(RESOLUTIONS).default('D'), export: exportFormat }),
  flags: {
    resolution: {
      flag: '--resolution',
      alias: '-r',
      help: 'resolution of the data (default: D)',
      metavar: `{${RESOLUTIONS.join(',')}}`,
    },
    export: EXPORT_FLAG,
  },
});

const EMA_ARGS = movingAverage(
  'ema',
  'The Exponential Moving Average gives more weight to recent prices than the simple average does.',
);
const SMA_ARGS = movingAverage('sma', 'The Simple Moving Average is the mean price over each window.');
const VWAP_ARGS = offsetOnly('vwap', 'The Volume Weighted Average Price, cumulative over the loaded period.');
const CCI_ARGS = singleLength('cci', 'The Commodity Channel Index measures deviation from the statistical mean.', '14');

const MACD_ARGS = defineArgs({
  prog: 'macd',
  description: 'The Moving Average Convergence Divergence is the difference between two exponential moving averages.',
  schema: z.object({
    fast: positiveInt.default('12'),
    slow: positiveInt.default('26'),
    signal: positiveInt.default('9'),
    offset: OFFSET,
    export: exportFormat,
  }),
  flags: {
    fast: { flag: '--fast', alias: '-f', help: 'the short period (default: 12)' },
    slow: { flag: '--slow', alias: '-s', help: 'the long period (default: 26)' },
    signal: { flag: '--signal', help: 'the signal period (default: 9)' },
    offset: OFFSET_FLAG,
    export: EXPORT_FLAG,
  },
});

const RSI_ARGS = singleLength('rsi', 'The Relative Strength Index compares the size of recent gains and losses.', '14');

const STOCH_ARGS = defineArgs({
  prog: 'stoch',
  description: 'The Stochastic Oscillator compares the close with the high-low range over a period.',
  schema: z.object({
    fastk: positiveInt.default('14'),
    slowd: positiveInt.default('3'),
    offset: OFFSET,
    export: exportFormat,
  }),
  flags: {
    fastk: { flag: '--fastkperiod', alias: '-k', help: 'the %K period (default: 14)' },
    slowd: { flag: '--slowdperiod', alias: '-d', help: 'the %D period (default: 3)' },
    offset: OFFSET_FLAG,
    export: EXPORT_FLAG,
  },
});

const ADX_ARGS = singleLength('adx', 'The Average Directional Index measures trend strength.', '14');
const AROON_ARGS = singleLength('aroon', 'Aroon tells how many periods have passed since the highest high and lowest low.', '25');

const BBANDS_ARGS = defineArgs({
  prog: 'bbands',
  description: 'Bollinger Bands are envelopes a number of standard deviations around a simple moving average.',
  schema: z.object({
    length: positiveInt.default('5'),
    std: positiveNumber.default('2'),
    offset: OFFSET,
    export: exportFormat,
  }),
  flags: {
    length: lengthFlag('5'),
    std: { flag: '--std', alias: '-s', help: 'number of standard deviations (default: 2)' },
    offset: OFFSET_FLAG,
    export: EXPORT_FLAG,
  },
});

const AD_ARGS = offsetOnly('ad', 'The Accumulation/Distribution Line relates price and volume flow.');
const OBV_ARGS = offsetOnly('obv', 'On Balance Volume adds volume on up days and subtracts it on down days.');

// ── Menu ───────────────────────────────────────────────────────────

export class TechnicalAnalysisMenu extends Menu {
  protected readonly title = 'Technical Analysis';

  constructor(
    deps: MenuDeps,
    private readonly session: StockSession,
  ) {
    super(deps, '(ta)> ');
    const { clients, presenter, config } = deps;
    const ticker = session.ticker;
    const candles = session.candles;

    this.command('view', VIEW_ARGS, async (_options, ctx) => {
      await mkdir(config.chartDir, { recursive: true });
      const path = await finviz.downloadChart(clients.finviz, ticker, join(config.chartDir, `${ticker}.jpg`));
      presenter.print(`Chart saved to ${path}`);
      ctx.scheduleCleanup(path);
    });

    this.command('summary', SUMMARY_ARGS, async () => {
      presenter.print(await finbrain.technicalSummary(clients.finbrain, ticker));
      presenter.print();
    });

    this.command('recom', RECOM_ARGS, async options => {
      const table = await tradingView.recommendation(
        clients.tradingView,
        ticker,
        options.screener,
        options.exchange,
        options.interval ?? '',
      );
      await this.show(table, 'recom', options.export);
    });

    this.command('pr', PR_ARGS, async options => {
      const table = await finnhub.patternRecognition(clients.finnhub, ticker, options.resolution);
      await this.show(table, 'pr', options.export);
    });

    this.command('ema', EMA_ARGS, o =>
      this.study('ema', 'Exponential Moving Average', indicators.ema(candles, o.length), o.offset, o.export),
    );
    this.command('sma', SMA_ARGS, o =>
      this.study('sma', 'Simple Moving Average', indicators.sma(candles, o.length), o.offset, o.export),
    );
    this.command('vwap', VWAP_ARGS, o =>
      this.study('vwap', 'Volume Weighted Average Price', indicators.vwap(candles), o.offset, o.export),
    );
    this.command('cci', CCI_ARGS, o =>
      this.study('cci', 'Commodity Channel Index', indicators.cci(candles, o.length), o.offset, o.export),
    );
    this.command('macd', MACD_ARGS, o =>
      this.study(
        'macd',
        'Moving Average Convergence Divergence',
        indicators.macd(candles, o.fast, o.slow, o.signal),
        o.offset,
        o.export,
      ),
    );
    this.command('rsi', RSI_ARGS, o =>
      this.study('rsi', 'Relative Strength Index', indicators.rsi(candles, o.length), o.offset, o.export),
    );
    this.command('stoch', STOCH_ARGS, o =>
      this.study('stoch', 'Stochastic Oscillator', indicators.stoch(candles, o.fastk, o.slowd), o.offset, o.export),
    );
    this.command('adx', ADX_ARGS, o =>
      this.study('adx', 'Average Directional Index', indicators.adx(candles, o.length), o.offset, o.export),
    );
    this.command('aroon', AROON_ARGS, o =>
      this.study('aroon', 'Aroon Indicator', indicators.aroon(candles, o.length), o.offset, o.export),
    );
    this.command('bbands', BBANDS_ARGS, o =>
      this.study('bbands', 'Bollinger Bands', indicators.bbands(candles, o.length, o.std), o.offset, o.export),
    );
    this.command('ad', AD_ARGS, o =>
      this.study('ad', 'Accumulation/Distribution Line', indicators.ad(candles), o.offset, o.export),
    );
    this.command('obv', OBV_ARGS, o =>
      this.study('obv', 'On Balance Volume', indicators.obv(candles), o.offset, o.export),
    );
  }

  protected helpSections(): HelpSection[] {
    return [
      {
        title: describeSession(this.session),
        commands: [
          ['view', 'view historical data and trendlines [Finviz]'],
          ['summary', 'technical summary report [FinBrain]'],
          ['recom', 'recommendation based on technical indicators [TradingView]'],
          ['pr', 'pattern recognition [Finnhub]'],
        ],
      },
      {
        title: 'Overlap',
        commands: [
          ['ema', 'exponential moving average'],
          ['sma', 'simple moving average'],
          ['vwap', 'volume weighted average price'],
        ],
      },
      {
        title: 'Momentum',
        commands: [
          ['cci', 'commodity channel index'],
          ['macd', 'moving average convergence/divergence'],
          ['rsi', 'relative strength index'],
          ['stoch', 'stochastic oscillator'],
        ],
      },
      {
        title: 'Trend',
        commands: [
          ['adx', 'average directional movement index'],
          ['aroon', 'aroon indicator'],
        ],
      },
      { title: 'Volatility', commands: [['bbands', 'bollinger bands']] },
      {
        title: 'Volume',
        commands: [
          ['ad', 'chaikin accumulation/distribution line values'],
          ['obv', 'on balance volume'],
        ],
      },
    ];
  }

  /** Print the last ten rows, then plot and export as configured */
  private async study(
    name: string,
    title: string,
    columns: IndicatorColumns,
    offset: number,
    format: ExportFormat | undefined,
  ): Promise<void> {
    const { presenter } = this.deps;
    const table = indicatorTable(`${this.session.ticker} ${title}`, this.session.candles, columns, {
      intraday: isIntraday(this.session),
      offset,
    });
    presenter.render(tailRows(table, 10));

    const chart = await presenter.plot(table, `${this.session.ticker}_${name}`);
    if (chart) presenter.print(`Chart saved to ${chart}`);

    if (format) {
      const path = await presenter.export(table, format, name);
      presenter.print(`Saved file: ${path}`);
    }
  }
}
