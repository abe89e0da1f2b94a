import { readFile, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Table } from '@marketshell/market-data';
import { chartFromTable, renderLineChartSvg } from '../src/presentation/chart.js';
import { exportTable, timestamp, toCsv } from '../src/presentation/export.js';
import { formatCell, formatTable } from '../src/presentation/format.js';
import { ConsolePresenter } from '../src/presentation/presenter.js';

const FEES: Table = {
  title: 'Fees',
  columns: ['Tx Type', 'Fee'],
  rows: [
    ['Fast', 30],
    ['Slow', 2.5],
  ],
};

describe('formatCell', () => {
  it('formats numbers and nulls', () => {
    expect(formatCell(null)).toBe('-');
    expect(formatCell('text')).toBe('text');
    expect(formatCell(1234567)).toBe('1,234,567');
    expect(formatCell(1234.5)).toBe('1,234.50');
    expect(formatCell(0.5)).toBe('0.5');
    expect(formatCell(-0.123456)).toBe('-0.1235');
  });
});

describe('formatTable', () => {
  it('aligns text left and numbers right under a dashed rule', () => {
    expect(formatTable(FEES)).toEqual([
      '  Fees',
      '  Tx Type   Fee',
      '  -------------',
      '  Fast       30',
      '  Slow     2.50',
    ]);
  });

  it('marks an empty table', () => {
    expect(formatTable({ title: 'Empty', columns: ['A'], rows: [] })).toEqual(['  Empty', '  A', '  -', '  (no data)']);
  });
});

describe('export', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'marketshell-export-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('stamps files with local date and time', () => {
    expect(timestamp(new Date(2024, 0, 2, 3, 4, 5))).toBe('20240102_030405');
  });

  it('quotes csv fields that need it', () => {
    const csv = toCsv({
      title: 'Quotes',
      columns: ['Name', 'Note'],
      rows: [
        ['a,b', 'say "hi"'],
        ['plain', null],
      ],
    });
    expect(csv).toBe('Name,Note\n"a,b","say ""hi"""\nplain,\n');
  });

  it('writes csv under the export directory', async () => {
    const path = await exportTable(FEES, 'csv', 'gwei', join(dir, 'exports'), new Date(2024, 0, 2, 3, 4, 5));

    expect(path).toBe(join(dir, 'exports', 'gwei_20240102_030405.csv'));
    expect(await readFile(path, 'utf8')).toBe('Tx Type,Fee\nFast,30\nSlow,2.5\n');
  });

  it('writes json as an array of row objects', async () => {
    const path = await exportTable(FEES, 'json', 'gwei', dir, new Date(2024, 0, 2, 3, 4, 5));

    expect(path.endsWith('gwei_20240102_030405.json')).toBe(true);
    expect(JSON.parse(await readFile(path, 'utf8'))).toEqual([
      { 'Tx Type': 'Fast', Fee: 30 },
      { 'Tx Type': 'Slow', Fee: 2.5 },
    ]);
  });
});

describe('charts', () => {
  const table: Table = {
    title: 'TST Simple Moving Average',
    columns: ['date', 'close', 'SMA_2', 'empty'],
    rows: [
      ['2023-01-03', 1, null, null],
      ['2023-01-04', 2, 1.5, null],
      ['2023-01-05', 3, 2.5, null],
    ],
  };

  it('turns numeric columns into series and skips empty ones', () => {
    expect(chartFromTable(table)).toEqual({
      title: 'TST Simple Moving Average',
      labels: ['2023-01-03', '2023-01-04', '2023-01-05'],
      series: [
        { name: 'close', values: [1, 2, 3] },
        { name: 'SMA_2', values: [null, 1.5, 2.5] },
      ],
    });
  });

  it('draws one polyline per series with a legend', () => {
    const svg = renderLineChartSvg(chartFromTable(table));
    const polylines = svg.split('\n').filter(line => line.startsWith('<polyline'));

    expect(polylines).toHaveLength(2);
    expect(polylines[1]?.match(/points="([^"]*)"/)?.[1]?.split(' ')).toHaveLength(2);
    expect(svg).toContain('>SMA_2</text>');
    expect(svg.startsWith('<svg')).toBe(true);
  });
});

describe('ConsolePresenter', () => {
  let dir: string;
  let out: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'marketshell-presenter-'));
    out = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function presenter(plot: boolean) {
    return new ConsolePresenter({
      useColor: false,
      plot,
      exportDir: join(dir, 'exports'),
      chartDir: join(dir, 'charts'),
      write: text => out.push(text),
    });
  }

  it('prints plain lines and errors without colour', () => {
    const p = presenter(false);
    p.print('hello');
    p.error('Error: nope');
    expect(out).toEqual(['hello\n', 'Error: nope\n']);
  });

  it('renders tables between blank lines', () => {
    presenter(false).render(FEES);
    expect(out).toEqual(['\n  Fees\n  Tx Type   Fee\n  -------------\n  Fast       30\n  Slow     2.50\n\n']);
  });

  it('skips plotting when disabled', async () => {
    await expect(presenter(false).plot(FEES, 'fees')).resolves.toBeNull();
  });

  it('writes an svg chart when enabled', async () => {
    const path = await presenter(true).plot(FEES, 'fees');
    expect(path).toBe(join(dir, 'charts', 'fees.svg'));
    expect(await readFile(join(dir, 'charts', 'fees.svg'), 'utf8')).toContain('<polyline');
  });

  it('colours errors when colour is on', () => {
    new ConsolePresenter({ useColor: true, plot: false, exportDir: dir, chartDir: dir, write: t => out.push(t) }).error('x');
    expect(out).toEqual(['\x1b[31mx\x1b[0m\n']);
  });
});
