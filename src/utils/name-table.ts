/**
 * Element and attribute name dictionaries.
 */
import { EncodingError } from '../errors.js';
import { ByteCursor } from './byte-cursor.js';

/** Ordered names addressed by their small integer id. */
export type NameTable = readonly string[];

/**
 * Reads a variable-length count followed by that many NUL-terminated names.
 * A name cut off by the end of the buffer is an EncodingError carrying the
 * bytes read so far.
 */
export function readNameTable(cursor: ByteCursor): NameTable {
  const count: number = cursor.readVarUint();
  const names: string[] = [];
  for (let i = 0; i < count; i++) {
    if (cursor.find(0) === -1) {
      const start: number = cursor.offset;
      throw new EncodingError('Name ends without a NUL terminator', start, Uint8Array.from(cursor.readBytes(cursor.remaining)));
    }
    names.push(cursor.readCString());
  }
  return names;
}

/**
 * Builds a name table in first-seen order, ignoring repeats.
 */
export function collectNames(names: Iterable<string>): { readonly table: NameTable; readonly ids: ReadonlyMap<string, number> } {
  const ids = new Map<string, number>();
  const table: string[] = [];
  for (const name of names) {
    if (!ids.has(name)) {
      ids.set(name, table.length);
      table.push(name);
    }
  }
  return { table, ids };
}
