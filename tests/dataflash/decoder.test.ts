import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { decodeRecord, formatFloat, formatRecord, readFieldBytes } from '../../src/dataflash/decoder.js';
import {
  CorruptStringError,
  IncompleteDataError,
  TextDecodeError,
  UnknownFormatError,
} from '../../src/dataflash/errors.js';
import type { ByteMap, FieldDescriptor } from '../../src/dataflash/types.js';

const BASE = 0x4000;

const bytesAt = (addr: number, bytes: readonly number[]): ByteMap =>
  new Map(bytes.map((b: number, i: number): [number, number] => [addr + i, b]));

const field = (format: string, description = 'Field'): FieldDescriptor => ({ format, description });

const valueOf = (format: string, bytes: readonly number[]): number | string =>
  decodeRecord(BASE, field(format), bytesAt(BASE, bytes)).value;

// Little-endian writer used to check decode/encode symmetry
const encode = (format: string, value: number): number[] => {
  const buf = new Uint8Array(4);
  const dv = new DataView(buf.buffer);
  switch (format) {
    case 'U1':
    case 'H1':
      dv.setUint8(0, value);
      return Array.from(buf.subarray(0, 1));
    case 'I1':
      dv.setInt8(0, value);
      return Array.from(buf.subarray(0, 1));
    case 'U2':
    case 'H2':
      dv.setUint16(0, value, true);
      return Array.from(buf.subarray(0, 2));
    case 'I2':
      dv.setInt16(0, value, true);
      return Array.from(buf.subarray(0, 2));
    case 'U4':
      dv.setUint32(0, value, true);
      return Array.from(buf);
    case 'I4':
      dv.setInt32(0, value, true);
      return Array.from(buf);
    case 'F4':
      dv.setFloat32(0, value, true);
      return Array.from(buf);
    default:
      throw new Error(`no encoder for ${format}`);
  }
};

const WIDTHS: ReadonlyArray<[string, number]> = [
  ['U1', 1],
  ['U2', 2],
  ['U4', 4],
  ['I1', 1],
  ['I2', 2],
  ['I4', 4],
  ['H1', 1],
  ['H2', 2],
];

describe('typed decoder: integers', (): void => {
  it('U2 decodes [lo, hi] as lo + hi * 256', (): void => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 255 }), fc.integer({ min: 0, max: 255 }), (lo: number, hi: number): void => {
        expect(valueOf('U2', [lo, hi])).toBe(lo + hi * 256);
      })
    );
  });

  it('I1 decodes bytes >= 0x80 as negative', (): void => {
    fc.assert(
      fc.property(fc.integer({ min: 0x80, max: 0xff }), (b: number): void => {
        expect(valueOf('I1', [b])).toBe(b - 256);
      })
    );
  });

  it('integer and bit formats re-encode to the same bytes', (): void => {
    for (const [format, width] of WIDTHS) {
      fc.assert(
        fc.property(fc.uint8Array({ minLength: width, maxLength: width }), (buf: Uint8Array): void => {
          const value = valueOf(format, Array.from(buf));
          expect(typeof value).toBe('number');
          if (typeof value === 'number') expect(encode(format, value)).toEqual(Array.from(buf));
        })
      );
    }
  });

  it('decodes boundary values', (): void => {
    expect(valueOf('U4', [0xff, 0xff, 0xff, 0xff])).toBe(4294967295);
    expect(valueOf('I4', [0xff, 0xff, 0xff, 0xff])).toBe(-1);
    expect(valueOf('I4', [0x00, 0x00, 0x00, 0x80])).toBe(-2147483648);
    expect(valueOf('I2', [0x00, 0x80])).toBe(-32768);
    expect(valueOf('I2', [0xff, 0x7f])).toBe(32767);
    expect(valueOf('U2', [0x34, 0x12])).toBe(0x1234);
  });
});

describe('typed decoder: floats', (): void => {
  it('F4 round-trips single precision values', (): void => {
    fc.assert(
      fc.property(fc.float({ noNaN: true }), (x: number): void => {
        expect(valueOf('F4', encode('F4', x))).toBe(x);
      })
    );
  });

  it('renders the widened single precision value', (): void => {
    expect(formatRecord(BASE, field('F4', 'CC Gain'), bytesAt(BASE, [0x00, 0x00, 0xc0, 0x3f]))).toBe(
      '0x4000: (F4) [CC Gain] = 1.5'
    );
    expect(decodeRecord(BASE, field('F4'), bytesAt(BASE, [0xcd, 0xcc, 0xcc, 0x3d])).text).toBe(
      '0.10000000149011612'
    );
    expect(decodeRecord(BASE, field('F4'), bytesAt(BASE, [0x00, 0x00, 0x80, 0xff])).text).toBe('-inf');
  });

  it('keeps a decimal point on whole values', (): void => {
    expect(formatRecord(BASE, field('F4', 'CC Gain'), bytesAt(BASE, [0x00, 0x00, 0x80, 0x3f]))).toBe(
      '0x4000: (F4) [CC Gain] = 1.0'
    );
    expect(formatFloat(-3)).toBe('-3.0');
    expect(formatFloat(-0)).toBe('-0.0');
    expect(formatFloat(1e15)).toBe('1000000000000000.0');
  });

  it('switches to exponent notation outside 1e-4 .. 1e16', (): void => {
    expect(formatFloat(Math.fround(1e16))).toBe('1.0000000272564224e+16');
    expect(formatFloat(Math.fround(1e-5))).toBe('9.999999747378752e-06');
    expect(formatFloat(1e16)).toBe('1e+16');
    expect(formatFloat(-2.5e-7)).toBe('-2.5e-07');
    expect(formatFloat(0.0001)).toBe('0.0001');
  });

  it('names non-finite values inf and nan', (): void => {
    expect(formatFloat(Infinity)).toBe('inf');
    expect(formatFloat(-Infinity)).toBe('-inf');
    expect(decodeRecord(BASE, field('F4'), bytesAt(BASE, [0x00, 0x00, 0xc0, 0x7f])).text).toBe('nan');
  });
});

describe('typed decoder: bit registers', (): void => {
  it('H1 shows hex and 8-bit binary', (): void => {
    expect(decodeRecord(BASE, field('H1'), bytesAt(BASE, [0x0a])).text).toBe('0x0A = 0b00001010');
  });

  it('H2 shows hex and 16-bit binary, little endian', (): void => {
    expect(decodeRecord(BASE, field('H2'), bytesAt(BASE, [0x34, 0x12])).text).toBe('0x1234 = 0b0001001000110100');
    expect(decodeRecord(BASE, field('H2'), bytesAt(BASE, [0x55, 0xff])).text).toBe('0xFF55 = 0b1111111101010101');
  });
});

describe('typed decoder: strings', (): void => {
  it('reads the length byte and ignores the rest of the buffer', (): void => {
    const line = formatRecord(BASE, field('S5', 'Device Chemistry'), bytesAt(BASE, [0x03, 0x41, 0x42, 0x43, 0x00]));
    expect(line).toBe('0x4000: (S5) [Device Chemistry] = ABC');
  });

  it('allows a string filling the whole buffer', (): void => {
    expect(valueOf('S5', [0x04, 0x31, 0x33, 0x35, 0x32])).toBe('1352');
  });

  it('renders an empty string for length 0', (): void => {
    expect(formatRecord(BASE, field('S21', 'Name'), bytesAt(BASE, new Array<number>(21).fill(0)))).toBe(
      '0x4000: (S21) [Name] = '
    );
  });

  it('rejects a length byte beyond the buffer capacity', (): void => {
    const data = bytesAt(BASE, [0x05, 0x41, 0x42, 0x43, 0x44]);
    expect((): unknown => decodeRecord(BASE, field('S5'), data)).toThrow(CorruptStringError);
    expect((): unknown => decodeRecord(BASE, field('S5'), data)).toThrow('0x4000: string length 5 exceeds capacity 4');
  });

  it('keeps a leading byte order mark', (): void => {
    expect(valueOf('S5', [0x04, 0xef, 0xbb, 0xbf, 0x41])).toBe('\uFEFFA');
  });

  it('rejects bytes that are not valid text', (): void => {
    const data = bytesAt(BASE, [0x02, 0xc3, 0x28]);
    expect((): unknown => decodeRecord(BASE, field('S3'), data)).toThrow(TextDecodeError);
  });
});

describe('typed decoder: errors and line format', (): void => {
  it('formats address, tag, description and value', (): void => {
    const data = bytesAt(0x4240, [0x2a, 0x01]);
    const rec = decodeRecord(0x4240, field('U2', 'Gas Gauging - State - Cycle Count'), data);
    expect(rec).toEqual({
      address: 0x4240,
      tag: 'U2',
      format: { kind: 'unsigned', width: 2 },
      description: 'Gas Gauging - State - Cycle Count',
      value: 298,
      text: '298',
      line: '0x4240: (U2) [Gas Gauging - State - Cycle Count] = 298',
    });
  });

  it('rejects unknown format tags', (): void => {
    const data = bytesAt(BASE, [0x00]);
    expect((): unknown => decodeRecord(BASE, field('X9'), data)).toThrow(UnknownFormatError);
    expect((): unknown => decodeRecord(BASE, field('X9'), data)).toThrow("0x4000: unhandled data format 'X9'");
  });

  it('rejects fields running past the bytes present', (): void => {
    const data = bytesAt(BASE, [0x01]);
    expect((): unknown => decodeRecord(BASE, field('U2'), data)).toThrow(IncompleteDataError);
    expect((): unknown => decodeRecord(BASE, field('U2'), data)).toThrow('0x4000: dataset has no byte at 0x4001');
  });

  it('reads field bytes lowest address first', (): void => {
    expect(Array.from(readFieldBytes(0x10, 3, bytesAt(0x10, [1, 2, 3, 4])))).toEqual([1, 2, 3]);
  });
});
