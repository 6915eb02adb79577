export * from './util/bit.js';
export * from './dataflash/errors.js';
export * from './dataflash/format.js';
export * from './dataflash/addresses.js';
export * from './dataflash/dump.js';
export * from './dataflash/schema.js';
export * from './dataflash/decoder.js';
export * from './dataflash/report.js';
export * from './dataflash/flags.js';
export * from './dataflash/raTable.js';
export type * from './dataflash/types.js';
export { loadConfig, type DataFlashConfig } from './config.js';
export { createLogger, type Logger, type LogFacility } from './debug/log.js';
export { run, type CliIO } from './cli/run.js';
export { parseArgs, UsageError, USAGE, type CliOptions, type ParsedArgs } from './cli/args.js';
