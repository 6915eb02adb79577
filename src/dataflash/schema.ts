import { readFileSync } from 'node:fs';
import { parseHex } from '../util/bit.js';
import { ADDRESS_MAX } from './addresses.js';
import { ParseError } from './errors.js';
import type { FieldDescriptor, Schema } from './types.js';

export const SCHEMA_DELIMITER = ';';

// Quoted fields keep delimiters literally; "" inside quotes is one quote.
// Returns null when a quote is left open.
export const splitRow = (row: string, delimiter: string = SCHEMA_DELIMITER): string[] | null => {
  const fields: string[] = [];
  let field = '';
  let quoted = false;
  for (let i = 0; i < row.length; i++) {
    const ch = row[i];
    if (quoted) {
      if (ch === '"') {
        if (row[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        field += ch;
      }
    } else if (ch === '"' && field === '') {
      quoted = true;
    } else if (ch === delimiter) {
      fields.push(field);
      field = '';
    } else {
      field += ch;
    }
  }
  if (quoted) return null;
  fields.push(field);
  return fields;
};

/**
 * Parse the Data Flash table: a header row, then `address;format;description` rows.
 * Format tags are not checked here; duplicate addresses keep the last row.
 */
export const parseSchema = (text: string, source = '<input>'): Schema => {
  const schema = new Map<number, FieldDescriptor>();
  const lines = text.split(/\r?\n/);

  // line 1 is the header
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i] ?? '';
    if (line.trim() === '') continue;
    const lineNo = i + 1;

    const fields = splitRow(line);
    if (fields === null) throw new ParseError(source, lineNo, 'unterminated quoted field');
    const [addrText, format, description] = fields;
    if (addrText === undefined || format === undefined || description === undefined) {
      throw new ParseError(source, lineNo, `expected 3 fields, got ${fields.length}`);
    }

    const addr = parseHex(addrText);
    if (addr === null) throw new ParseError(source, lineNo, `bad address '${addrText}'`);
    if (addr > ADDRESS_MAX) throw new ParseError(source, lineNo, `address '${addrText}' is out of range`);
    schema.set(addr, { format, description });
  }

  return schema;
};

export const loadSchema = (filePath: string): Schema => parseSchema(readFileSync(filePath, 'utf-8'), filePath);
