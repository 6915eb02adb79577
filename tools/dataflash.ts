#!/usr/bin/env node

/**
 * Data Flash dump inspector
 *
 * Usage:
 *   tsx tools/dataflash.ts list <dump.txt> [--flags]
 *   tsx tools/dataflash.ts diff <dump1.txt> <dump2.txt> [--full] [--names]
 *   tsx tools/dataflash.ts ra <dump.txt> [--raw]
 *
 * Environment:
 *   DATAFLASH_SCHEMA   Data Flash table to use instead of data/data_descriptions.csv
 *   DATAFLASH_FLAGS    register bit catalog instead of data/register_flags.json
 *   DATAFLASH_DEBUG=1  log load and report statistics to stderr
 */

import { run } from '../src/cli/run.js';

process.exitCode = run(process.argv.slice(2), {
  stdout: { write: (line: string): void => console.log(line) },
  stderr: console,
});
