// Table export to csv or json under the export directory, one timestamped file per call

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Cell, Table } from '@marketshell/market-data';
import type { ExportFormat } from '../args/types.js';

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as YYYYMMDD_HHMMSS */
export function timestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}_` +
    `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  );
}

function csvField(value: Cell): string {
  if (value === null) return '';
  const s = String(value);
  return /[",\n\r]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function toCsv(table: Table): string {
  const lines = [table.columns, ...table.rows].map(row => row.map(csvField).join(','));
  return lines.join('\n') + '\n';
}

export function toJson(table: Table): string {
  const records = table.rows.map(row => Object.fromEntries(table.columns.map((col, i) => [col, row[i] ?? null])));
  return JSON.stringify(records, null, 2) + '\n';
}

export async function exportTable(
  table: Table,
  format: ExportFormat,
  name: string,
  dir: string,
  now: Date = new Date(),
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, `${name}_${timestamp(now)}.${format}`);
  await writeFile(path, format === 'csv' ? toCsv(table) : toJson(table), 'utf8');
  return path;
}
