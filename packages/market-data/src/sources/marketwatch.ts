// MarketWatch pages (scraped): SEC filings and statement comparison

import type { VendorClient } from '../client.js';
import { UpstreamFormatError } from '../errors.js';
import { parseHtmlTables, type HtmlTable } from '../html.js';
import type { Cell, Table } from '../table.js';
import { CacheTTL } from '../vendors.js';

const SITE = 'https://www.marketwatch.com';

const FILING_COLUMNS = ['Filing Date', 'Document Date', 'Type', 'Category', 'Amended'];

export function parseSecFilings(html: string): Table {
  const table = parseHtmlTables(html).find(t => t.headers.includes('Filing Date'));
  if (!table) throw new UpstreamFormatError('MarketWatch', 'SEC filings table not found');

  const index = FILING_COLUMNS.map(col => table.headers.indexOf(col));
  const rows: Cell[][] = table.rows.map(row => {
    const href = row.links[0];
    const link = href ? (href.startsWith('http') ? href : SITE + href) : null;
    return [...index.map(i => (i >= 0 ? row.cells[i] ?? null : null)), link];
  });

  return { title: 'SEC Filings', columns: [...FILING_COLUMNS, 'Link'], rows };
}

export async function secFilings(client: VendorClient, ticker: string): Promise<Table> {
  const html = await client.getText(
    `investing/stock/${encodeURIComponent(ticker.toLowerCase())}/financials/secfilings`,
    {},
    { cacheTtl: CacheTTL.MEDIUM },
  );
  return parseSecFilings(html);
}

// ── Statement comparison ──────────────────────────────────────────

export type Statement = 'income' | 'balance' | 'cashflow';

const STATEMENT_PATH: Record<Statement, string> = {
  income: 'income',
  balance: 'balance-sheet',
  cashflow: 'cash-flow',
};

const STATEMENT_TITLE: Record<Statement, string> = {
  income: 'Income Data',
  balance: 'Company Comparison',
  cashflow: 'Cashflow Comparison',
};

export interface StatementData {
  /** Period headers, oldest first */
  periods: string[];
  items: Map<string, string[]>;
}

function isPeriodHeader(header: string): boolean {
  return header !== '' && !/trend/i.test(header);
}

export function parseStatement(html: string): StatementData {
  const table = parseHtmlTables(html).find((t: HtmlTable) => /^item/i.test(t.headers[0] ?? ''));
  if (!table) throw new UpstreamFormatError('MarketWatch', 'financial statement table not found');

  const periodIdx: number[] = [];
  table.headers.forEach((h, i) => {
    if (i > 0 && isPeriodHeader(h)) periodIdx.push(i);
  });

  const items = new Map<string, string[]>();
  for (const row of table.rows) {
    const label = row.cells[0];
    if (!label || items.has(label)) continue;
    items.set(label, periodIdx.map(i => row.cells[i] ?? ''));
  }
  return { periods: periodIdx.map(i => table.headers[i] ?? ''), items };
}

export async function fetchStatement(
  client: VendorClient,
  ticker: string,
  statement: Statement,
  quarter: boolean,
): Promise<StatementData> {
  const path = `investing/stock/${encodeURIComponent(ticker.toLowerCase())}/financials/${STATEMENT_PATH[statement]}${quarter ? '/quarter' : ''}`;
  const html = await client.getText(path, {}, { cacheTtl: CacheTTL.MEDIUM });
  return parseStatement(html);
}

/**
 * Join several statements on line item. `timeframe` picks the period column
 * (e.g. "2022"); when omitted the latest period is used.
 */
export function combineStatements(
  statement: Statement,
  byTicker: ReadonlyArray<readonly [string, StatementData]>,
  timeframe?: string,
): Table {
  const first = byTicker[0];
  if (!first) return { title: STATEMENT_TITLE[statement], columns: ['Item'], rows: [] };

  const period = timeframe ?? first[1].periods[first[1].periods.length - 1];
  if (!period) throw new UpstreamFormatError('MarketWatch', 'statement has no periods');

  const columnIdx = byTicker.map(([ticker, data]) => {
    const idx = data.periods.indexOf(period);
    if (idx < 0) {
      throw new UpstreamFormatError(
        'MarketWatch',
        `period ${period} not available for ${ticker.toUpperCase()} (available: ${data.periods.join(', ')})`,
      );
    }
    return idx;
  });

  const labels: string[] = [];
  for (const [, data] of byTicker) {
    for (const label of data.items.keys()) {
      if (!labels.includes(label)) labels.push(label);
    }
  }

  return {
    title: `${STATEMENT_TITLE[statement]} (${period})`,
    columns: ['Item', ...byTicker.map(([t]) => t.toUpperCase())],
    rows: labels.map(label => [
      label,
      ...byTicker.map(([, data], i) => data.items.get(label)?.[columnIdx[i] ?? -1] || null),
    ]),
  };
}

export async function financialComparison(
  client: VendorClient,
  tickers: string[],
  statement: Statement,
  timeframe: string | undefined,
  quarter: boolean,
): Promise<Table> {
  const data: Array<[string, StatementData]> = [];
  for (const ticker of tickers) {
    data.push([ticker, await fetchStatement(client, ticker, statement, quarter)]);
  }
  return combineStatements(statement, data, timeframe);
}
