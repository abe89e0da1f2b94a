export { command, runCommand } from './command.js';
export type { CommandBody, MenuDeps } from './command.js';
export { CryptoMenu } from './crypto-menu.js';
export { DueDiligenceMenu } from './due-diligence-menu.js';
export { helpText, Menu } from './menu.js';
export type { HelpSection } from './menu.js';
export { RootMenu } from './root-menu.js';
export { describeSession, isIntraday, LOAD_INTERVALS } from './session.js';
export type { CoinSession, LoadInterval, StockSession } from './session.js';
export { TechnicalAnalysisMenu } from './technical-analysis-menu.js';
