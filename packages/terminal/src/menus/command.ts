// Parses options, runs the command body and reports failures

import { isUpstreamError, type VendorClients } from '@marketshell/market-data';
import type { z } from 'zod';
import { ArgumentError, parseArgs, type CommandArgs, type ParsedArgs } from '../args/parser.js';
import type { TerminalConfig } from '../config.js';
import type { Logger } from '../logger.js';
import type { Presenter } from '../presentation/presenter.js';
import type { CommandContext, CommandHandler, CommandResult } from '../router/command-router.js';
import type { LineReader } from '../router/line-reader.js';
import { ControlSignal } from '../router/signals.js';

export interface MenuDeps {
  config: TerminalConfig;
  clients: VendorClients;
  presenter: Presenter;
  reader: LineReader;
  logger: Logger;
  now?: () => Date;
}

type Reporting = Pick<MenuDeps, 'presenter' | 'logger'>;

export async function runCommand(
  deps: Reporting,
  run: () => CommandResult | Promise<CommandResult>,
): Promise<ControlSignal> {
  try {
    return (await run()) ?? ControlSignal.CONTINUE;
  } catch (err) {
    if (err instanceof ArgumentError || isUpstreamError(err)) {
      deps.presenter.error(`Error: ${err.message}`);
      deps.logger.debug(err.name, { message: err.message });
    } else {
      const message = err instanceof Error ? err.message : String(err);
      deps.presenter.error(`Error: ${message}`);
      deps.logger.error('unexpected failure', { error: err instanceof Error ? err.stack ?? message : message });
    }
    return ControlSignal.CONTINUE;
  }
}

export type CommandBody<Shape extends z.ZodRawShape> = (
  options: ParsedArgs<Shape>,
  ctx: CommandContext,
) => CommandResult | Promise<CommandResult>;

export function command<Shape extends z.ZodRawShape>(
  deps: Reporting,
  args: CommandArgs<Shape>,
  body: CommandBody<Shape>,
): CommandHandler {
  return (tokens, ctx) =>
    runCommand(deps, () => {
      const options = parseArgs(args, tokens, {
        print: text => deps.presenter.print(text),
        warn: message => deps.presenter.error(`Error: ${message}`),
        logger: deps.logger,
      });
      if (options === null) return ControlSignal.CONTINUE;
      return body(options, ctx);
    });
}
