// Test doubles shared by the terminal tests

import type { Candles, Table } from '@marketshell/market-data';
import type { ExportFormat } from '../src/args/types.js';
import type { Presenter } from '../src/presentation/presenter.js';

export class RecordingPresenter implements Presenter {
  readonly printed: string[] = [];
  readonly errors: string[] = [];
  readonly rendered: Table[] = [];
  readonly plots: Array<{ name: string; table: Table }> = [];
  readonly exports: Array<{ name: string; format: ExportFormat; table: Table }> = [];

  print(text = ''): void {
    this.printed.push(text);
  }

  error(message: string): void {
    this.errors.push(message);
  }

  render(table: Table): void {
    this.rendered.push(table);
  }

  async plot(table: Table, name: string): Promise<string | null> {
    this.plots.push({ name, table });
    return `charts/${name}.svg`;
  }

  async export(table: Table, format: ExportFormat, name: string): Promise<string> {
    this.exports.push({ name, format, table });
    return `exports/${name}.${format}`;
  }
}

/** Daily candles starting 2023-01-03 with high/low one point either side of close */
export function makeCandles(closes: number[]): Candles {
  return {
    timestamps: closes.map((_, i) => 1672704000 + i * 86_400),
    open: [...closes],
    high: closes.map(c => c + 1),
    low: closes.map(c => c - 1),
    close: [...closes],
    volume: closes.map(() => 100),
  };
}

export function range(from: number, to: number): number[] {
  return Array.from({ length: to - from + 1 }, (_, i) => from + i);
}
