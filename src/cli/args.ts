import { hex, parseHex } from '../util/bit.js';
import { DATA_FLASH, isDataFlashAddress } from '../dataflash/addresses.js';
import { DataFlashError } from '../dataflash/errors.js';

export class UsageError extends DataFlashError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type Command = 'list' | 'diff' | 'ra';

const DUMP_COUNT: Readonly<Record<Command, number>> = { list: 1, diff: 2, ra: 1 };

const isCommand = (s: string): s is Command => s === 'list' || s === 'diff' || s === 'ra';

export interface CliOptions {
  help: false;
  command: Command;
  dumps: string[];
  schema?: string | undefined;
  start: number;
  end: number;
  full: boolean; // diff: keep the Ra table region
  names: boolean; // diff: label lines with dump file names
  flags: boolean; // list: annotate bit registers
  raw: boolean; // ra: print dump-format blocks
}

export type ParsedArgs = { help: true } | CliOptions;

export const USAGE = [
  'Usage: dataflash <command> [options]',
  '',
  'Commands:',
  '  list <dump>            Print every described field of a dump',
  '  diff <dump1> <dump2>   Print fields whose values differ (Ra table skipped unless --full)',
  '  ra <dump>              Print the Ra tables',
  '',
  'Options:',
  '  --schema <file>        Data Flash table (default: data/data_descriptions.csv)',
  `  --start <hex>          First address (default: 0x${hex(DATA_FLASH.START, 4)})`,
  `  --end <hex>            Last address (default: 0x${hex(DATA_FLASH.END, 4)})`,
  '  --full                 diff: include the Ra table region',
  '  --names                diff: label lines with the dump file names',
  '  --flags                list: show named bits of known registers',
  '  --raw                  ra: print raw blocks in dump format',
  '  -h, --help             Show this help',
].join('\n');

const parseAddress = (opt: string, value: string): number => {
  const n = parseHex(value);
  if (n === null || !isDataFlashAddress(n)) {
    throw new UsageError(
      `${opt} expects a hex address in 0x${hex(DATA_FLASH.START, 4)}..0x${hex(DATA_FLASH.END, 4)}, got '${value}'`
    );
  }
  return n;
};

export const parseArgs = (argv: readonly string[]): ParsedArgs => {
  const positionals: string[] = [];
  let schema: string | undefined;
  let start: number = DATA_FLASH.START;
  let end: number = DATA_FLASH.END;
  let full = false;
  let names = false;
  let flags = false;
  let raw = false;

  const valueOf = (opt: string, i: number): string => {
    const v = argv[i];
    if (v === undefined || v.startsWith('--')) throw new UsageError(`${opt} needs a value`);
    return v;
  };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    switch (a) {
      case '-h':
      case '--help':
        return { help: true };
      case '--schema':
        schema = valueOf(a, ++i);
        break;
      case '--start':
        start = parseAddress(a, valueOf(a, ++i));
        break;
      case '--end':
        end = parseAddress(a, valueOf(a, ++i));
        break;
      case '--full':
        full = true;
        break;
      case '--names':
        names = true;
        break;
      case '--flags':
        flags = true;
        break;
      case '--raw':
        raw = true;
        break;
      default:
        if (a.startsWith('-')) throw new UsageError(`unknown option '${a}'`);
        positionals.push(a);
    }
  }

  const [command, ...dumps] = positionals;
  if (command === undefined) throw new UsageError('missing command');
  if (!isCommand(command)) throw new UsageError(`unknown command '${command}'`);
  const expected = DUMP_COUNT[command];
  if (dumps.length !== expected) {
    throw new UsageError(`${command} expects ${expected} dump file${expected > 1 ? 's' : ''}, got ${dumps.length}`);
  }
  if (start > end) throw new UsageError(`--start 0x${hex(start, 4)} is after --end 0x${hex(end, 4)}`);

  return { help: false, command, dumps, schema, start, end, full, names, flags, raw };
};
