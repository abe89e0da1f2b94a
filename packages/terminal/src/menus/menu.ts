// One CommandRouter per menu, with help/q/quit registered up front

import type { Table } from '@marketshell/market-data';
import type { z } from 'zod';
import type { CommandArgs } from '../args/parser.js';
import type { ExportFormat } from '../args/types.js';
import { CommandRouter } from '../router/command-router.js';
import { ControlSignal, type ExitSignal } from '../router/signals.js';
import { command, type CommandBody, type MenuDeps } from './command.js';

export interface HelpSection {
  title?: string;
  commands: ReadonlyArray<readonly [name: string, description: string]>;
}

const COMMON_COMMANDS = [
  ['help', 'show this menu again'],
  ['q', 'quit this menu, and go back to the previous one'],
  ['quit', 'quit to abandon the program'],
] as const;

export function helpText(title: string, sections: readonly HelpSection[]): string {
  const all = [{ commands: COMMON_COMMANDS }, ...sections];
  const width = Math.max(...all.flatMap(s => s.commands.map(([name]) => name.length)));
  const lines = [`${title}:`];
  for (const section of all) {
    lines.push('');
    if (section.title) lines.push(`${section.title}:`);
    for (const [name, description] of section.commands) {
      lines.push(`   ${name.padEnd(width)}    ${description}`);
    }
  }
  return lines.join('\n');
}

export abstract class Menu {
  protected readonly router: CommandRouter;

  constructor(
    protected readonly deps: MenuDeps,
    prompt: string,
  ) {
    this.router = new CommandRouter({
      prompt,
      reader: deps.reader,
      report: message => deps.presenter.error(message),
      logger: deps.logger,
    });
    this.router.register('help', () => this.printHelp());
    this.router.register('q', () => ControlSignal.EXIT_MENU);
    this.router.register('quit', () => ControlSignal.EXIT_PROGRAM);
  }

  protected abstract readonly title: string;
  protected abstract helpSections(): HelpSection[];

  get commands(): string[] {
    return this.router.commands;
  }

  printHelp(): void {
    this.deps.presenter.print(helpText(this.title, this.helpSections()) + '\n');
  }

  run(): Promise<ExitSignal> {
    this.printHelp();
    return this.router.run();
  }

  dispatch(line: string): Promise<ControlSignal> {
    return this.router.dispatch(line);
  }

  protected command<Shape extends z.ZodRawShape>(name: string, args: CommandArgs<Shape>, body: CommandBody<Shape>): void {
    this.router.register(name, command(this.deps, args, body));
  }

  /** Run a sub-menu; EXIT_PROGRAM propagates, EXIT_MENU comes back here */
  protected async enter(menu: Menu): Promise<ControlSignal> {
    const signal = await menu.run();
    if (signal === ControlSignal.EXIT_PROGRAM) return signal;
    this.printHelp();
    return ControlSignal.CONTINUE;
  }

  /** Render a table and export it when asked */
  protected async show(table: Table, name: string, format?: ExportFormat): Promise<void> {
    this.deps.presenter.render(table);
    if (format) {
      const path = await this.deps.presenter.export(table, format, name);
      this.deps.presenter.print(`Saved file: ${path}`);
    }
  }
}
