// Name → handler registry driving one menu's read/dispatch loop

import { rm } from 'node:fs/promises';
import { silentLogger, type Logger } from '../logger.js';
import { DuplicateCommandError, UnknownCommandError } from './errors.js';
import type { LineReader } from './line-reader.js';
import { ControlSignal, isExitSignal, type ExitSignal } from './signals.js';

export interface CommandContext {
  /** Name the handler was dispatched under */
  readonly command: string;
  /** Delete `path` before the next line is dispatched */
  scheduleCleanup(path: string): void;
}

export type CommandResult = ControlSignal | void;

export type CommandHandler = (args: string[], ctx: CommandContext) => CommandResult | Promise<CommandResult>;

export interface CommandRouterOptions {
  prompt: string;
  reader: LineReader;
  /** User-facing diagnostics (unknown command, handler failure) */
  report: (message: string) => void;
  logger?: Logger;
}

export class CommandRouter {
  private readonly handlers = new Map<string, CommandHandler>();
  private readonly prompt: string;
  private readonly reader: LineReader;
  private readonly report: (message: string) => void;
  private readonly logger: Logger;
  private pendingCleanup: string | null = null;
  private running = false;

  constructor(options: CommandRouterOptions) {
    this.prompt = options.prompt;
    this.reader = options.reader;
    this.report = options.report;
    this.logger = options.logger ?? silentLogger;
  }

  register(name: string, handler: CommandHandler): this {
    if (this.running) throw new Error(`cannot register "${name}" while the router is running`);
    if (this.handlers.has(name)) throw new DuplicateCommandError(name);
    this.handlers.set(name, handler);
    return this;
  }

  get commands(): string[] {
    return [...this.handlers.keys()];
  }

  /** Artifact that will be removed before the next dispatch, if any */
  get pendingArtifact(): string | null {
    return this.pendingCleanup;
  }

  async dispatch(rawLine: string): Promise<ControlSignal> {
    await this.cleanup();

    const [name, ...args] = rawLine.trim().split(/\s+/).filter(Boolean);
    if (name === undefined) return ControlSignal.CONTINUE;

    const handler = this.handlers.get(name);
    if (!handler) {
      const err = new UnknownCommandError(name, this.commands);
      this.report(err.message);
      return ControlSignal.CONTINUE;
    }

    const ctx: CommandContext = {
      command: name,
      scheduleCleanup: path => {
        this.pendingCleanup = path;
      },
    };

    try {
      return (await handler(args, ctx)) ?? ControlSignal.CONTINUE;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.report(`Error: ${message}`);
      this.logger.error(`command "${name}" failed`, {
        error: err instanceof Error ? err.stack ?? message : message,
      });
      return ControlSignal.CONTINUE;
    }
  }

  async run(): Promise<ExitSignal> {
    this.running = true;
    try {
      for (;;) {
        this.reader.setCompletions?.(this.commands);
        const line = await this.reader.read(this.prompt);
        if (line === null) {
          await this.cleanup();
          return ControlSignal.EXIT_PROGRAM;
        }
        const signal = await this.dispatch(line);
        if (isExitSignal(signal)) return signal;
      }
    } finally {
      this.running = false;
    }
  }

  private async cleanup(): Promise<void> {
    const path = this.pendingCleanup;
    if (path === null) return;
    this.pendingCleanup = null;
    try {
      await rm(path, { force: true });
    } catch (err) {
      this.logger.warn(`could not remove ${path}`, { error: err instanceof Error ? err.message : String(err) });
    }
  }
}
