/**
 * @file byte-cursor.test.ts
 * @description Fixed-width, variable-length and string reads over ByteCursor.
 */

import { describe, it, expect } from 'vitest';
import { ByteCursor, encodeVarUint } from '../../src/utils/byte-cursor.js';
import { readNameTable } from '../../src/utils/name-table.js';
import { EncodingError, FormatError } from '../../src/errors.js';
import { thrown } from '../helpers/container.js';

describe('ByteCursor fixed-width reads', () => {
  it('reads little-endian values and advances', () => {
    const cursor = new ByteCursor(Buffer.from([
      0x7f,
      0x34, 0x12,
      0x78, 0x56, 0x34, 0x12,
      0xff, 0xff, 0xff, 0xff,
      0x00, 0x00, 0x80, 0x3f,
      0x01, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x80,
    ]));
    expect(cursor.readUint8()).toBe(0x7f);
    expect(cursor.readUint16()).toBe(0x1234);
    expect(cursor.readUint32()).toBe(0x12345678);
    expect(cursor.readInt32()).toBe(-1);
    expect(cursor.readFloat32()).toBe(1);
    expect(cursor.readUint64()).toBe(0x8000000000000001n);
    expect(cursor.offset).toBe(23);
    expect(cursor.remaining).toBe(0);
  });

  it('fails with the offset when too few bytes remain', () => {
    const cursor = new ByteCursor(Buffer.from([0x01, 0x02, 0x03]));
    cursor.readUint16();
    expect(() => cursor.readUint16()).toThrow(FormatError);
    const error = thrown(() => cursor.readUint32());
    expect(error).toBeInstanceOf(FormatError);
    expect(error).toHaveProperty('offset', 2);
    expect(error).toHaveProperty('message', '4 byte(s) needed, 1 available (at offset 2)');
    expect(cursor.offset).toBe(2);
  });

  it('returns byte slices and refuses to read past the end', () => {
    const cursor = new ByteCursor(Buffer.from([1, 2, 3, 4]));
    expect([...cursor.readBytes(3)]).toEqual([1, 2, 3]);
    expect(() => cursor.readBytes(2)).toThrow(FormatError);
  });
});

describe('variable-length integers', () => {
  it('encodes low groups first with continuation bits', () => {
    expect([...encodeVarUint(0)]).toEqual([0x00]);
    expect([...encodeVarUint(127)]).toEqual([0x7f]);
    expect([...encodeVarUint(128)]).toEqual([0x80, 0x01]);
    expect([...encodeVarUint(300)]).toEqual([0xac, 0x02]);
    expect([...encodeVarUint(0xffffffff)]).toEqual([0xff, 0xff, 0xff, 0xff, 0x0f]);
  });

  it('decodes every encoded 32-bit value back', () => {
    const values = [0, 1, 127, 128, 255, 16383, 16384, 0x7fffffff, 0x80000000, 0xffffffff];
    for (const value of values) {
      const cursor = new ByteCursor(encodeVarUint(value));
      expect(cursor.readVarUint()).toBe(value);
      expect(cursor.remaining).toBe(0);
    }
  });

  it('accepts encodings longer than 64 bits', () => {
    const big = (1n << 70n) + 5n;
    expect(new ByteCursor(encodeVarUint(big)).readVarUintBig()).toBe(big);
  });

  it('rejects values beyond the safe integer range as counts', () => {
    const cursor = new ByteCursor(encodeVarUint(1n << 60n));
    expect(() => cursor.readVarUint()).toThrow(FormatError);
  });

  it('reads zero padding groups past the safe integer width', () => {
    const padded = Buffer.from([0x85, ...new Array<number>(1000).fill(0x80), 0x00]);
    const cursor = new ByteCursor(padded);
    expect(cursor.readVarUint()).toBe(5);
    expect(cursor.remaining).toBe(0);
  });

  it('stops at the first group that overflows a safe integer', () => {
    const cursor = new ByteCursor(Buffer.from([...new Array<number>(100_000).fill(0xff), 0x7f]));
    const error = thrown(() => cursor.readVarUint());
    expect(error).toBeInstanceOf(FormatError);
    expect(error).toHaveProperty('offset', 7);
    expect(cursor.offset).toBe(7);
  });

  it('fails when the stream ends mid-sequence', () => {
    const cursor = new ByteCursor(Buffer.from([0x80, 0x80]));
    expect(() => cursor.readVarUint()).toThrow('Variable-length integer starting at 0 is truncated (at offset 2)');
  });

  it('refuses to encode negative values', () => {
    expect(() => encodeVarUint(-1)).toThrow(RangeError);
  });
});

describe('strings and name tables', () => {
  it('reads NUL-terminated UTF-8', () => {
    const cursor = new ByteCursor(Buffer.from('héllo\0next\0', 'utf8'));
    expect(cursor.readCString()).toBe('héllo');
    expect(cursor.readCString()).toBe('next');
    expect(cursor.remaining).toBe(0);
  });

  it('reports invalid UTF-8 with the raw bytes', () => {
    const cursor = new ByteCursor(Buffer.from([0x41, 0x00, 0xff, 0xfe, 0x00]));
    cursor.readCString();
    const error = thrown(() => cursor.readCString());
    expect(error).toBeInstanceOf(EncodingError);
    expect(error).toHaveProperty('offset', 2);
    expect(error).toHaveProperty('raw', Uint8Array.from([0xff, 0xfe]));
    expect(error).toHaveProperty('message', 'Invalid UTF-8 sequence (at offset 2, bytes fffe)');
  });

  it('fails on a missing terminator', () => {
    const cursor = new ByteCursor(Buffer.from('AB', 'ascii'));
    expect(() => cursor.readCString()).toThrow('Unterminated string starting at 0 (at offset 2)');
  });

  it('reads exactly the declared number of names', () => {
    const cursor = new ByteCursor(Buffer.from([0x02, 0x41, 0x00, 0x42, 0x43, 0x00, 0x44, 0x00]));
    expect(readNameTable(cursor)).toEqual(['A', 'BC']);
    expect(cursor.offset).toBe(6);
  });

  it('reports a name cut off by the end of the buffer with its bytes', () => {
    const cursor = new ByteCursor(Buffer.from([0x02, 0x41, 0x00, 0x42, 0x43]));
    const error = thrown(() => readNameTable(cursor));
    expect(error).toBeInstanceOf(EncodingError);
    expect(error).toHaveProperty('offset', 3);
    expect(error).toHaveProperty('raw', Uint8Array.from([0x42, 0x43]));
    expect(error).toHaveProperty('message', 'Name ends without a NUL terminator (at offset 3, bytes 4243)');
  });

  it('reports a name missing entirely with no raw bytes', () => {
    const cursor = new ByteCursor(Buffer.from([0x03, 0x41, 0x00]));
    const error = thrown(() => readNameTable(cursor));
    expect(error).toBeInstanceOf(EncodingError);
    expect(error).toHaveProperty('raw', new Uint8Array(0));
  });

  it('keeps a truncated name-table count a FormatError', () => {
    const cursor = new ByteCursor(Buffer.from([0x80]));
    expect(() => readNameTable(cursor)).toThrow(FormatError);
  });
});
