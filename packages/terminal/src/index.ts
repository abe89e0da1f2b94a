// @marketshell/terminal — public surface for embedding the menus or reusing the router

export * from './args/index.js';
export * from './indicators/index.js';
export * from './menus/index.js';
export * from './presentation/index.js';
export * from './router/index.js';
export { loadTerminalConfig, TerminalEnvSchema } from './config.js';
export type { TerminalConfig } from './config.js';
export { createColorizer, createLogger, LOG_LEVELS, silentLogger } from './logger.js';
export type { Colorize, Color, Logger, LoggerOptions, LogLevel } from './logger.js';
