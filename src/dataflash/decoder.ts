import { bin, hex, hex4 } from '../util/bit.js';
import { CorruptStringError, IncompleteDataError, TextDecodeError, UnknownFormatError } from './errors.js';
import { parseFormatTag, type FieldFormat } from './format.js';
import type { ByteMap, DecodedRecord, FieldDescriptor } from './types.js';

const textDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** `width` bytes starting at `addr`, lowest address first. */
export const readFieldBytes = (addr: number, width: number, dataset: ByteMap): Uint8Array => {
  const buf = new Uint8Array(width);
  for (let i = 0; i < width; i++) {
    const b = dataset.get(addr + i);
    if (b === undefined) throw new IncompleteDataError(addr, addr + i);
    buf[i] = b;
  }
  return buf;
};

const decodeString = (addr: number, buf: Uint8Array): string => {
  const len = buf[0] ?? 0;
  const capacity = buf.length - 1;
  if (len > capacity) throw new CorruptStringError(addr, len, capacity);
  try {
    return textDecoder.decode(buf.subarray(1, len + 1));
  } catch (err) {
    if (err instanceof TypeError) throw new TextDecodeError(addr);
    throw err;
  }
};

export type NumericFormat = Exclude<FieldFormat, { kind: 'string' }>;

export const decodeNumber = (format: NumericFormat, buf: Uint8Array): number => {
  const dv = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  switch (format.kind) {
    case 'float':
      return dv.getFloat32(0, true);
    case 'signed':
      if (format.width === 1) return dv.getInt8(0);
      if (format.width === 2) return dv.getInt16(0, true);
      return dv.getInt32(0, true);
    case 'unsigned':
    case 'bits':
      if (format.width === 1) return dv.getUint8(0);
      if (format.width === 2) return dv.getUint16(0, true);
      return dv.getUint32(0, true);
  }
};

export const decodeValue = (addr: number, format: FieldFormat, buf: Uint8Array): number | string =>
  format.kind === 'string' ? decodeString(addr, buf) : decodeNumber(format, buf);

/**
 * Shortest round-trip float text: whole values keep a `.0`, exponents below -4 or from 16
 * up switch to `d.ddde±NN`, non-finite values read `inf`, `-inf` and `nan`.
 */
export const formatFloat = (x: number): string => {
  if (Number.isNaN(x)) return 'nan';
  if (!Number.isFinite(x)) return x > 0 ? 'inf' : '-inf';
  if (Object.is(x, -0)) return '-0.0';

  const [mantissa = '', expText = '0'] = x.toExponential().split('e');
  const exp = Number(expText);
  if (exp < -4 || exp >= 16) {
    const sign = exp < 0 ? '-' : '+';
    return `${mantissa}e${sign}${String(Math.abs(exp)).padStart(2, '0')}`;
  }
  const text = String(x);
  return Number.isInteger(x) ? `${text}.0` : text;
};

export const renderValue = (format: FieldFormat, value: number | string): string => {
  if (typeof value === 'string') return value;
  if (format.kind === 'bits') {
    const digits = format.width * 2;
    return `0x${hex(value, digits)} = 0b${bin(value, digits * 4)}`;
  }
  if (format.kind === 'float') return formatFloat(value);
  return String(value);
};

export const formatLine = (addr: number, tag: string, description: string, text: string): string =>
  `0x${hex4(addr)}: (${tag}) [${description}] = ${text}`;

export const decodeRecord = (addr: number, descriptor: FieldDescriptor, dataset: ByteMap): DecodedRecord => {
  const format = parseFormatTag(descriptor.format);
  if (format === null) throw new UnknownFormatError(addr, descriptor.format);

  const buf = readFieldBytes(addr, format.width, dataset);
  const value = decodeValue(addr, format, buf);
  const text = renderValue(format, value);
  return {
    address: addr,
    tag: descriptor.format,
    format,
    description: descriptor.description,
    value,
    text,
    line: formatLine(addr, descriptor.format, descriptor.description, text),
  };
};

export const formatRecord = (addr: number, descriptor: FieldDescriptor, dataset: ByteMap): string =>
  decodeRecord(addr, descriptor, dataset).line;
