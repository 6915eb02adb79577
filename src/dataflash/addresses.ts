export const DATA_FLASH = {
  START: 0x4000,
  END: 0x5fff,
  // Ra table rows hold learned cell impedance; they change on every update
  RA_TABLE_START: 0x4102,
  RA_TABLE_END: 0x41de,
} as const;

// dumps and schemas address a 16-bit space
export const ADDRESS_MAX = 0xffff;

export interface AddressSpan {
  start: number;
  end: number; // inclusive
}

export const RA_TABLE_SPAN: AddressSpan = { start: DATA_FLASH.RA_TABLE_START, end: DATA_FLASH.RA_TABLE_END };

export const isDataFlashAddress = (addr: number): boolean =>
  Number.isInteger(addr) && addr >= DATA_FLASH.START && addr <= DATA_FLASH.END;

/** Ascending addresses `start..end` (inclusive), minus every excluded span. */
export const addressRange = (start: number, end: number, exclude: readonly AddressSpan[] = []): number[] => {
  const out: number[] = [];
  for (let a = start; a <= end; a++) {
    if (exclude.some((s: AddressSpan): boolean => a >= s.start && a <= s.end)) continue;
    out.push(a);
  }
  return out;
};

export const FULL_ADDRESS_RANGE: readonly number[] = addressRange(DATA_FLASH.START, DATA_FLASH.END);
export const ADDRESSES_WITHOUT_RA_TABLE: readonly number[] = addressRange(DATA_FLASH.START, DATA_FLASH.END, [
  RA_TABLE_SPAN,
]);
