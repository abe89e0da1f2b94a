export { CommandRouter } from './command-router.js';
export type { CommandContext, CommandHandler, CommandResult, CommandRouterOptions } from './command-router.js';
export { DuplicateCommandError, UnknownCommandError } from './errors.js';
export { ReadlineLineReader, ScriptedLineReader, splitScript } from './line-reader.js';
export type { LineReader } from './line-reader.js';
export { ControlSignal, isExitSignal } from './signals.js';
export type { ExitSignal } from './signals.js';
