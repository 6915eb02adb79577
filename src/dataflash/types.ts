import type { FieldFormat } from './format.js';

/** address -> byte (0..255) */
export type ByteMap = ReadonlyMap<number, number>;

export interface FieldDescriptor {
  readonly format: string; // raw tag, validated when decoded
  readonly description: string;
}

export type Schema = ReadonlyMap<number, FieldDescriptor>;

export interface DecodedRecord {
  readonly address: number;
  readonly tag: string;
  readonly format: FieldFormat;
  readonly description: string;
  readonly value: number | string;
  readonly text: string; // rendered value
  readonly line: string;
}
