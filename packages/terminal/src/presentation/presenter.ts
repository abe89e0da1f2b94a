// All user-facing output goes through a Presenter

import type { Table } from '@marketshell/market-data';
import type { ExportFormat } from '../args/types.js';
import { createColorizer, type Colorize } from '../logger.js';
import { chartFromTable, writeChart } from './chart.js';
import { exportTable } from './export.js';
import { formatTable } from './format.js';

export interface Presenter {
  print(text?: string): void;
  error(message: string): void;
  render(table: Table): void;
  /** Writes `<chartDir>/<name>.svg`; null when plotting is disabled */
  plot(table: Table, name: string): Promise<string | null>;
  export(table: Table, format: ExportFormat, name: string): Promise<string>;
}

export interface ConsolePresenterOptions {
  useColor: boolean;
  plot: boolean;
  exportDir: string;
  chartDir: string;
  write?: (text: string) => void;
  now?: () => Date;
}

export class ConsolePresenter implements Presenter {
  readonly c: Colorize;
  private readonly write: (text: string) => void;
  private readonly now: () => Date;

  constructor(private readonly options: ConsolePresenterOptions) {
    this.c = createColorizer(options.useColor);
    this.write = options.write ?? (text => process.stdout.write(text));
    this.now = options.now ?? (() => new Date());
  }

  print(text = ''): void {
    this.write(text + '\n');
  }

  error(message: string): void {
    this.write(this.c('red', message) + '\n');
  }

  render(table: Table): void {
    this.write('\n' + formatTable(table, this.c).join('\n') + '\n\n');
  }

  async plot(table: Table, name: string): Promise<string | null> {
    if (!this.options.plot) return null;
    return writeChart(chartFromTable(table), name, this.options.chartDir);
  }

  async export(table: Table, format: ExportFormat, name: string): Promise<string> {
    return exportTable(table, format, name, this.options.exportDir, this.now());
  }
}
