import { headRows, marketWatch } from '@marketshell/market-data';
import { z } from 'zod';
import { defineArgs } from '../args/parser.js';
import { EXPORT_FLAG, exportFormat, flag, positiveInt, text, tickerList } from '../args/types.js';
import type { MenuDeps } from './command.js';
import { Menu, type HelpSection } from './menu.js';
import type { StockSession } from './session.js';

const SEC_ARGS = defineArgs({
  prog: 'sec',
  description: 'Prints SEC filings of the company, most recent first [MarketWatch].',
  schema: z.object({ num: positiveInt.default('5'), export: exportFormat }),
  flags: {
    num: { flag: '--num', alias: '-n', help: 'number of latest filings to show (default: 5)' },
    export: EXPORT_FLAG,
  },
});

function statementArgs(prog: marketWatch.Statement, what: string) {
  return defineArgs({
    prog,
    description: `Prints ${what} of the company and, optionally, of similar companies side by side [MarketWatch].`,
    schema: z.object({
      similar: tickerList.optional(),
      timeframe: text.optional(),
      quarter: flag,
      export: exportFormat,
    }),
    flags: {
      similar: { flag: '--similar', help: 'comma separated tickers to compare with', metavar: 'T1,T2' },
      timeframe: { flag: '--timeframe', alias: '-t', help: 'period column to show (default: latest)' },
      quarter: { flag: '--quarter', alias: '-q', help: 'quarterly instead of annual statements', switch: true },
      export: EXPORT_FLAG,
    },
  });
}

const STATEMENTS = [
  ['income', 'income statement', statementArgs('income', 'the income statement')],
  ['balance', 'balance sheet', statementArgs('balance', 'the balance sheet')],
  ['cashflow', 'cash flow statement', statementArgs('cashflow', 'the cash flow statement')],
] as const;

export class DueDiligenceMenu extends Menu {
  protected readonly title = 'Due Diligence';

  constructor(
    deps: MenuDeps,
    private readonly session: Pick<StockSession, 'ticker'>,
  ) {
    super(deps, '(dd)> ');
    const { clients } = deps;
    const ticker = session.ticker;

    this.command('sec', SEC_ARGS, async options => {
      const table = await marketWatch.secFilings(clients.marketWatch, ticker);
      await this.show(headRows(table, options.num), 'sec', options.export);
    });

    for (const [statement, , args] of STATEMENTS) {
      this.command(statement, args, async options => {
        const tickers = [ticker, ...(options.similar ?? []).filter(t => t !== ticker)];
        const table = await marketWatch.financialComparison(
          clients.marketWatch,
          tickers,
          statement,
          options.timeframe,
          options.quarter,
        );
        await this.show(table, statement, options.export);
      });
    }
  }

  protected helpSections(): HelpSection[] {
    return [
      {
        title: `Ticker: ${this.session.ticker}`,
        commands: [
          ['sec', 'SEC filings [MarketWatch]'],
          ...STATEMENTS.map(([name, what]) => [name, `${what}, optionally against similar companies [MarketWatch]`] as const),
        ],
      },
    ];
  }
}
