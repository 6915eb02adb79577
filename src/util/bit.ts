export const u8 = (n: number): number => (n & 0xff) >>> 0;
export const u16 = (n: number): number => (n & 0xffff) >>> 0;
export const getBit = (n: number, bit: number): number => ((n >>> bit) & 1) >>> 0;

// Fixed-width renderers; values wider than `digits` are not truncated
export const hex = (n: number, digits: number): string => (n >>> 0).toString(16).toUpperCase().padStart(digits, '0');
export const bin = (n: number, digits: number): string => (n >>> 0).toString(2).padStart(digits, '0');
export const hex2 = (n: number): string => hex(u8(n), 2);
export const hex4 = (n: number): string => hex(u16(n), 4);

const HEX_LITERAL = /^(?:0[xX])?([0-9a-fA-F]+)$/;

// Accepts `4000`, `0x4000` and `0X4000`; anything else yields null
export const parseHex = (text: string): number | null => {
  const m = HEX_LITERAL.exec(text.trim());
  if (!m || m[1] === undefined) return null;
  return parseInt(m[1], 16);
};
