import { decodeRecord } from './decoder.js';
import { describeFlags, type RegisterFlagCatalog } from './flags.js';
import type { ByteMap, Schema } from './types.js';

export interface LineSink {
  write: (line: string) => void;
}

export interface LineCollector extends LineSink {
  lines: string[];
}

export const createLineCollector = (): LineCollector => {
  const lines: string[] = [];
  const write = (line: string): void => {
    lines.push(line);
  };
  return { lines, write };
};

export interface ListOptions {
  flags?: RegisterFlagCatalog | undefined; // annotate known bit registers
}

export interface DiffOptions {
  labels?: readonly [string, string] | undefined;
}

export const DEFAULT_DIFF_LABELS: readonly [string, string] = ['dataset 1', 'dataset 2'];

/** One line per schema field in `range`. Returns the number of fields written. */
export const listRecords = (
  range: Iterable<number>,
  schema: Schema,
  dataset: ByteMap,
  sink: LineSink,
  opts?: ListOptions
): number => {
  let count = 0;
  for (const addr of range) {
    const descriptor = schema.get(addr);
    if (!descriptor) continue;
    const rec = decodeRecord(addr, descriptor, dataset);
    sink.write(rec.line);
    count++;

    const reg = opts?.flags?.get(addr);
    if (reg && rec.format.kind === 'bits' && typeof rec.value === 'number') {
      for (const l of describeFlags(reg, rec.value)) sink.write(l);
    }
  }
  return count;
};

/**
 * Writes both lines plus a blank separator for every field whose rendering differs.
 * Returns the number of differing fields.
 */
export const diffRecords = (
  range: Iterable<number>,
  schema: Schema,
  dataset1: ByteMap,
  dataset2: ByteMap,
  sink: LineSink,
  opts?: DiffOptions
): number => {
  const [label1, label2] = opts?.labels ?? DEFAULT_DIFF_LABELS;
  let diffs = 0;
  for (const addr of range) {
    const descriptor = schema.get(addr);
    if (!descriptor) continue;
    const line1 = decodeRecord(addr, descriptor, dataset1).line;
    const line2 = decodeRecord(addr, descriptor, dataset2).line;
    if (line1 === line2) continue;
    sink.write(`${label1}: ${line1}`);
    sink.write(`${label2}: ${line2}`);
    sink.write('');
    diffs++;
  }
  return diffs;
};
