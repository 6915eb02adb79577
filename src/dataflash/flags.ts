import { readFileSync } from 'node:fs';
import { getBit, parseHex } from '../util/bit.js';
import { ParseError } from './errors.js';

export interface RegisterFlag {
  bit: number;
  name: string;
  caption: string;
}

export interface RegisterFlags {
  address: number;
  name: string;
  flags: RegisterFlag[];
}

export type RegisterFlagCatalog = ReadonlyMap<number, RegisterFlags>;

const isObject = (v: unknown): v is Record<string, unknown> => typeof v === 'object' && v !== null && !Array.isArray(v);

const toFlag = (v: unknown): RegisterFlag | null => {
  if (!isObject(v)) return null;
  const { bit, name, caption } = v;
  if (typeof bit !== 'number' || !Number.isInteger(bit) || bit < 0 || bit > 31) return null;
  if (typeof name !== 'string' || typeof caption !== 'string') return null;
  return { bit, name, caption };
};

const toRegister = (v: unknown): RegisterFlags | null => {
  if (!isObject(v)) return null;
  const { address, name, flags } = v;
  if (typeof address !== 'string' || typeof name !== 'string' || !Array.isArray(flags)) return null;
  const addr = parseHex(address);
  if (addr === null) return null;
  const parsed: RegisterFlag[] = [];
  for (const f of flags) {
    const flag = toFlag(f);
    if (flag === null) return null;
    parsed.push(flag);
  }
  return { address: addr, name, flags: parsed };
};

/** Parse the `{ registers: [...] }` catalog of named bits for H1/H2 registers. */
export const parseRegisterFlags = (text: string, source = '<input>'): RegisterFlagCatalog => {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (err) {
    throw new ParseError(source, null, `invalid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  const registers = isObject(doc) ? doc.registers : undefined;
  if (!Array.isArray(registers)) {
    throw new ParseError(source, null, `expected an object with a 'registers' array`);
  }

  const catalog = new Map<number, RegisterFlags>();
  registers.forEach((entry: unknown, i: number): void => {
    const reg = toRegister(entry);
    if (reg === null) throw new ParseError(source, null, `registers[${i}] is malformed`);
    catalog.set(reg.address, reg);
  });
  return catalog;
};

export const loadRegisterFlags = (filePath: string): RegisterFlagCatalog =>
  parseRegisterFlags(readFileSync(filePath, 'utf-8'), filePath);

export const describeFlags = (reg: RegisterFlags, value: number): string[] =>
  reg.flags.map((f: RegisterFlag): string => `    Bit ${f.bit}: ${f.name} - ${f.caption} = ${getBit(value, f.bit)}`);
