export { ArgumentError, defineArgs, parseArgs, usage } from './parser.js';
export type { CommandArgs, FlagSpec, ParseSettings, ParsedArgs } from './parser.js';
export * from './types.js';
