// Tabular result shared by every source, the console renderer, the chart writer and exports

export type Cell = string | number | null;

export interface Table {
  title: string;
  columns: string[];
  rows: Cell[][];
}

/**
 * Build a table from plain records. Columns default to the keys of the first
 * record; values that are not strings or finite numbers become null.
 */
export function tableFromRecords(
  title: string,
  records: ReadonlyArray<Record<string, unknown>>,
  columns?: string[],
): Table {
  const cols = columns ?? (records.length > 0 ? Object.keys(records[0]) : []);
  return {
    title,
    columns: cols,
    rows: records.map(r => cols.map(col => toCell(r[col]))),
  };
}

export function toCell(value: unknown): Cell {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return null;
}

export function headRows(table: Table, n: number): Table {
  return { ...table, rows: table.rows.slice(0, Math.max(0, n)) };
}

export function tailRows(table: Table, n: number): Table {
  return { ...table, rows: n > 0 ? table.rows.slice(-n) : [] };
}

/** Two-column Metric | Value table, the layout most coin views use */
export function keyValueTable(title: string, entries: ReadonlyArray<readonly [string, unknown]>): Table {
  return {
    title,
    columns: ['Metric', 'Value'],
    rows: entries.map(([k, v]) => [k, toCell(v)]),
  };
}
