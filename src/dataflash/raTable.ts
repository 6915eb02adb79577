import { hex2, hex4 } from '../util/bit.js';
import { decodeNumber, readFieldBytes, type NumericFormat } from './decoder.js';
import type { ByteMap } from './types.js';

/**
 * Ra tables: per-cell impedance learned by Impedance Track.
 * Each table is an H2 flag word followed by 15 I2 values (32 bytes).
 * The x-tables alternate with the plain ones to spread flash wear.
 *
 * Flag high byte: 00 updated, 05 RELAX + QMax update in progress,
 *                 55 DISCHARGE + impedance updated, FF never updated.
 * Flag low byte:  00 not used + QMax updated, 55 in use, FF never used.
 */
export const RA_TABLES: readonly { name: string; address: number }[] = [
  { name: 'R_a0', address: 0x4100 },
  { name: 'R_a1', address: 0x4140 },
  { name: 'R_a0x', address: 0x4180 },
  { name: 'R_a1x', address: 0x41c0 },
];

export const RA_TABLE_SIZE = 32;
export const RA_ROW_VALUES = 15;

export interface RaTableRow {
  name: string;
  address: number;
  flag: number;
  values: number[];
}

const H2: NumericFormat = { kind: 'bits', width: 2 };
const I2: NumericFormat = { kind: 'signed', width: 2 };

export const readRaTables = (dataset: ByteMap): RaTableRow[] =>
  RA_TABLES.map(({ name, address }): RaTableRow => {
    const flag = decodeNumber(H2, readFieldBytes(address, 2, dataset));
    const values: number[] = [];
    for (let i = 0; i < RA_ROW_VALUES; i++) {
      const a = address + 2 + i * 2;
      values.push(decodeNumber(I2, readFieldBytes(a, 2, dataset)));
    }
    return { name, address, flag, values };
  });

export const formatRaTable = (row: RaTableRow): string =>
  `0x${hex4(row.address)}: ${row.name} flag=0x${hex4(row.flag)} [ ${row.values.join(' ')} ]`;

/** Raw 32-byte blocks in dump text format, loadable by parseDump. */
export const formatRaTableRaw = (dataset: ByteMap): string[] =>
  RA_TABLES.map(({ address }): string => {
    const bytes = Array.from(readFieldBytes(address, RA_TABLE_SIZE, dataset), hex2);
    return `0x${hex4(address)}: [ ${bytes.join(' ')} ]`;
  });
