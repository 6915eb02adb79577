import { hex } from '../util/bit.js';

const addr = (a: number): string => `0x${hex(a, 4)}`;

export class DataFlashError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataFlashError';
  }
}

/** Malformed dump line, schema row or catalog entry. `line` is 1-based, null when the input has no lines to point at. */
export class ParseError extends DataFlashError {
  constructor(
    readonly source: string,
    readonly line: number | null,
    detail: string
  ) {
    super(line === null ? `${source}: ${detail}` : `${source}:${line}: ${detail}`);
    this.name = 'ParseError';
  }
}

export class UnknownFormatError extends DataFlashError {
  constructor(
    readonly address: number,
    readonly tag: string
  ) {
    super(`${addr(address)}: unhandled data format '${tag}'`);
    this.name = 'UnknownFormatError';
  }
}

export class IncompleteDataError extends DataFlashError {
  constructor(
    readonly address: number,
    readonly missing: number
  ) {
    super(`${addr(address)}: dataset has no byte at ${addr(missing)}`);
    this.name = 'IncompleteDataError';
  }
}

export class CorruptStringError extends DataFlashError {
  constructor(
    readonly address: number,
    readonly length: number,
    readonly capacity: number
  ) {
    super(`${addr(address)}: string length ${length} exceeds capacity ${capacity}`);
    this.name = 'CorruptStringError';
  }
}

export class TextDecodeError extends DataFlashError {
  constructor(readonly address: number) {
    super(`${addr(address)}: string bytes are not valid text`);
    this.name = 'TextDecodeError';
  }
}
