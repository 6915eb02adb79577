import { basename } from 'node:path';
import { loadConfig, type DataFlashConfig } from '../config.js';
import { createLogger, type LogFacility, type Logger } from '../debug/log.js';
import { addressRange, RA_TABLE_SPAN } from '../dataflash/addresses.js';
import { loadDump } from '../dataflash/dump.js';
import { loadRegisterFlags } from '../dataflash/flags.js';
import { formatRaTable, formatRaTableRaw, readRaTables } from '../dataflash/raTable.js';
import { diffRecords, listRecords, type LineSink } from '../dataflash/report.js';
import { loadSchema } from '../dataflash/schema.js';
import type { Schema } from '../dataflash/types.js';
import { parseArgs, USAGE, UsageError, type CliOptions } from './args.js';

export interface CliIO {
  stdout: LineSink;
  stderr: LogFacility;
}

const openSchema = (opts: CliOptions, config: DataFlashConfig, log: Logger): Schema => {
  const file = opts.schema ?? config.schemaFile;
  const schema = loadSchema(file);
  log.debug(`${schema.size} fields from ${file}`);
  return schema;
};

const execute = (opts: CliOptions, config: DataFlashConfig, out: LineSink, log: Logger): void => {
  const [first = '', second = ''] = opts.dumps;

  switch (opts.command) {
    case 'list': {
      const schema = openSchema(opts, config, log);
      const dataset = loadDump(first);
      log.debug(`${dataset.size} bytes from ${first}`);
      const flags = opts.flags ? loadRegisterFlags(config.flagsFile) : undefined;
      const n = listRecords(addressRange(opts.start, opts.end), schema, dataset, out, { flags });
      log.debug(`${n} fields listed`);
      return;
    }
    case 'diff': {
      const schema = openSchema(opts, config, log);
      const dataset1 = loadDump(first);
      const dataset2 = loadDump(second);
      const range = addressRange(opts.start, opts.end, opts.full ? [] : [RA_TABLE_SPAN]);
      const labels: [string, string] | undefined = opts.names ? [basename(first), basename(second)] : undefined;
      const n = diffRecords(range, schema, dataset1, dataset2, out, { labels });
      log.debug(`${n} fields differ`);
      return;
    }
    case 'ra': {
      const dataset = loadDump(first);
      const lines = opts.raw ? formatRaTableRaw(dataset) : readRaTables(dataset).map(formatRaTable);
      for (const l of lines) out.write(l);
      return;
    }
  }
};

/** Runs one command line; returns the process exit code. */
export const run = (argv: readonly string[], io: CliIO, config: DataFlashConfig = loadConfig()): number => {
  const log = createLogger('dataflash', config.debug, io.stderr);
  try {
    const opts = parseArgs(argv);
    if (opts.help) {
      for (const l of USAGE.split('\n')) io.stdout.write(l);
      return 0;
    }
    execute(opts, config, io.stdout, log);
    return 0;
  } catch (err) {
    if (!(err instanceof Error)) throw err;
    log.error(err.message);
    if (err instanceof UsageError) io.stderr.error(USAGE);
    return 1;
  }
};
