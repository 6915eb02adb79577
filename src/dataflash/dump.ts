import { readFileSync } from 'node:fs';
import { hex4, parseHex } from '../util/bit.js';
import { ADDRESS_MAX } from './addresses.js';
import { ParseError } from './errors.js';
import type { ByteMap } from './types.js';

const BYTE_TOKEN = /^[0-9a-fA-F]{2}$/;

/**
 * Parse a dump in the text form
 *
 *   0x4000: [ 0A 1B 2C ... ]
 *   0x4020: [ ... ]
 *
 * Each line starts a run of consecutive addresses. Later lines overwrite earlier ones.
 */
export const parseDump = (text: string, source = '<input>'): ByteMap => {
  const bytes = new Map<number, number>();
  const lines = text.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = (lines[i] ?? '').trimEnd();
    if (line === '') continue;
    const lineNo = i + 1;

    const sep = line.indexOf(': ');
    if (sep < 0) throw new ParseError(source, lineNo, `missing ': ' delimiter`);

    const addrText = line.slice(0, sep);
    const addr = parseHex(addrText);
    if (addr === null) throw new ParseError(source, lineNo, `bad address '${addrText}'`);
    if (addr > ADDRESS_MAX) throw new ParseError(source, lineNo, `address '${addrText}' is out of range`);

    const body = line.slice(sep + 2).trim();
    if (!body.startsWith('[') || !body.endsWith(']')) {
      throw new ParseError(source, lineNo, 'byte list must be enclosed in [ ]');
    }
    const tokens = body.slice(1, -1).split(/\s+/).filter((t: string): boolean => t.length > 0);
    if (tokens.length === 0) throw new ParseError(source, lineNo, 'empty byte list');
    if (addr + tokens.length - 1 > ADDRESS_MAX) {
      throw new ParseError(source, lineNo, `byte list runs past 0x${hex4(ADDRESS_MAX)}`);
    }

    let a = addr;
    for (const tok of tokens) {
      if (!BYTE_TOKEN.test(tok)) throw new ParseError(source, lineNo, `bad byte '${tok}'`);
      bytes.set(a++, parseInt(tok, 16));
    }
  }

  return bytes;
};

export const loadDump = (filePath: string): ByteMap => parseDump(readFileSync(filePath, 'utf-8'), filePath);
