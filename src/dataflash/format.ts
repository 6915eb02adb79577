/**
 * Data Flash value formats.
 *
 *   U1 U2 U4  unsigned, little endian
 *   I1 I2 I4  two's complement, little endian
 *   F4        IEEE754 single precision, little endian
 *   H1 H2     bit registers, stored as unsigned
 *   S<n>      length byte followed by up to n-1 data bytes
 */
export type FieldFormat =
  | { readonly kind: 'unsigned'; readonly width: 1 | 2 | 4 }
  | { readonly kind: 'signed'; readonly width: 1 | 2 | 4 }
  | { readonly kind: 'float'; readonly width: 4 }
  | { readonly kind: 'bits'; readonly width: 1 | 2 }
  | { readonly kind: 'string'; readonly width: number };

export type FormatKind = FieldFormat['kind'];

const FIXED_FORMATS: ReadonlyMap<string, FieldFormat> = new Map<string, FieldFormat>([
  ['U1', { kind: 'unsigned', width: 1 }],
  ['U2', { kind: 'unsigned', width: 2 }],
  ['U4', { kind: 'unsigned', width: 4 }],
  ['I1', { kind: 'signed', width: 1 }],
  ['I2', { kind: 'signed', width: 2 }],
  ['I4', { kind: 'signed', width: 4 }],
  ['F4', { kind: 'float', width: 4 }],
  ['H1', { kind: 'bits', width: 1 }],
  ['H2', { kind: 'bits', width: 2 }],
]);

const STRING_TAG = /^S([1-9][0-9]*)$/;

export const FIXED_FORMAT_TAGS: readonly string[] = [...FIXED_FORMATS.keys()];

export const parseFormatTag = (tag: string): FieldFormat | null => {
  const fixed = FIXED_FORMATS.get(tag);
  if (fixed) return fixed;
  const m = STRING_TAG.exec(tag);
  if (m && m[1] !== undefined) return { kind: 'string', width: parseInt(m[1], 10) };
  return null;
};
