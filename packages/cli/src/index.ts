export { setupMemory, withMemory, loadConfig, parseArgs } from './setup.js';
export type { CliContext, GlobalOptions } from './setup.js';
export * from './output/formatter.js';
