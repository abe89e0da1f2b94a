// Console table rendering

import type { Cell, Table } from '@marketshell/market-data';
import type { Colorize } from '../logger.js';

const plain: Colorize = (_color, text) => text;

export function formatCell(value: Cell): string {
  if (value === null) return '-';
  if (typeof value === 'string') return value;
  if (Number.isInteger(value)) return value.toLocaleString('en-US');
  if (Math.abs(value) < 1) return String(Number(value.toPrecision(4)));
  return value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

/** Lines of the rendered table, each indented by two spaces */
export function formatTable(table: Table, c: Colorize = plain): string[] {
  const cells = table.rows.map(row => table.columns.map((_, i) => formatCell(row[i] ?? null)));
  const numeric = table.columns.map((_, i) => table.rows.some(row => typeof row[i] === 'number'));
  const widths = table.columns.map((col, i) => Math.max(col.length, ...cells.map(r => r[i]?.length ?? 0)));
  const align = (s: string, i: number) => (numeric[i] ? s.padStart(widths[i] ?? 0) : s.padEnd(widths[i] ?? 0));
  const total = widths.reduce((sum, w) => sum + w, 0) + 2 * Math.max(0, widths.length - 1);

  const lines = [`  ${c('bold', table.title)}`];
  lines.push(`  ${c('dim', table.columns.map(align).join('  ').trimEnd())}`);
  lines.push(`  ${c('dim', '-'.repeat(total))}`);
  if (cells.length === 0) {
    lines.push(`  ${c('gray', '(no data)')}`);
  }
  for (const row of cells) {
    lines.push(`  ${row.map(align).join('  ').trimEnd()}`);
  }
  return lines;
}
