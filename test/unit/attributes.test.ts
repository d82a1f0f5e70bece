/**
 * @file attributes.test.ts
 * @description Typed attribute payloads, their text forms and block terminators.
 */

import { describe, it, expect } from 'vitest';
import {
  attributeKindForCode,
  formatAttributeValue,
  formatFixed4,
  readAttributeBlock,
  readAttributeBlocks,
} from '../../src/attributes.js';
import { FormatError } from '../../src/errors.js';
import { ByteCursor } from '../../src/utils/byte-cursor.js';
import { block, cstr, f32, thrown, u32 } from '../helpers/container.js';

const NAMES = ['id', 'pos', 'name', 'flags', 'big'];

describe('attribute type codes', () => {
  it('maps the closed set of codes', () => {
    expect(attributeKindForCode(0x01, 0)).toBe('string');
    expect(attributeKindForCode(0x03, 0)).toBe('string');
    expect(attributeKindForCode(0x02, 0)).toBe('uint32');
    expect(attributeKindForCode(0x05, 0)).toBe('int32');
    expect(attributeKindForCode(0x06, 0)).toBe('matrix');
    expect(attributeKindForCode(0x08, 0)).toBe('uint64');
  });

  it('rejects any other code', () => {
    for (const code of [0x00, 0x04, 0x07, 0x09, 0xff]) {
      expect(() => attributeKindForCode(code, 10)).toThrow(FormatError);
    }
    expect(() => attributeKindForCode(0x07, 10)).toThrow('Unknown attribute type code 0x07 (at offset 10)');
  });
});

describe('attribute text forms', () => {
  it('renders integers in decimal', () => {
    expect(formatAttributeValue({ kind: 'uint32', value: 4294967295 })).toBe('4294967295');
    expect(formatAttributeValue({ kind: 'int32', value: -42 })).toBe('-42');
    expect(formatAttributeValue({ kind: 'uint64', value: 18446744073709551615n })).toBe('18446744073709551615');
  });

  it('joins matrices at four decimals', () => {
    expect(formatAttributeValue({ kind: 'matrix', value: [1, 2] })).toBe('1.0000,2.0000');
    expect(formatAttributeValue({ kind: 'matrix', value: [] })).toBe('');
    expect(formatAttributeValue({ kind: 'matrix', value: [-1.5, 0.25] })).toBe('-1.5000,0.2500');
  });

  it('rounds exact halves to even', () => {
    expect(formatFixed4(1.03125)).toBe('1.0312');
    expect(formatFixed4(1.09375)).toBe('1.0938');
    expect(formatFixed4(-1.03125)).toBe('-1.0312');
    expect(formatFixed4(0.000025)).toBe('0.0000');
  });

  it('spells signed zero and non-finite values', () => {
    expect(formatFixed4(-0)).toBe('-0.0000');
    expect(formatFixed4(0)).toBe('0.0000');
    expect(formatFixed4(-0.00001)).toBe('-0.0000');
    expect(formatFixed4(Number.NaN)).toBe('nan');
    expect(formatFixed4(Number.POSITIVE_INFINITY)).toBe('inf');
    expect(formatFixed4(Number.NEGATIVE_INFINITY)).toBe('-inf');
    expect(formatFixed4(1e21)).toBe('1000000000000000000000.0000');
  });
});

describe('readAttributeBlock', () => {
  it('decodes every payload type in stored order', () => {
    const bytes = block(
      [0, 0x02, u32(1)],
      [1, 0x06, Buffer.concat([u32(2), f32(1), f32(2)])],
      [2, 0x01, cstr('hi')],
      [3, 0x05, Buffer.from([0xff, 0xff, 0xff, 0xff])],
      [4, 0x08, Buffer.alloc(8, 0xff)],
    );
    const cursor = new ByteCursor(bytes);
    const attributes = readAttributeBlock(cursor, NAMES);
    expect([...attributes]).toEqual([
      ['id', '1'],
      ['pos', '1.0000,2.0000'],
      ['name', 'hi'],
      ['flags', '-1'],
      ['big', '18446744073709551615'],
    ]);
    expect(cursor.remaining).toBe(0);
  });

  it('treats code 0x03 as a string', () => {
    const attributes = readAttributeBlock(new ByteCursor(block([2, 0x03, cstr('alt')])), NAMES);
    expect(attributes.get('name')).toBe('alt');
  });

  it('keeps the last value of a repeated name', () => {
    const attributes = readAttributeBlock(new ByteCursor(block([0, 0x02, u32(1)], [0, 0x02, u32(2)])), NAMES);
    expect([...attributes]).toEqual([['id', '2']]);
  });

  it('reports a bad terminator at the detection offset', () => {
    // count 00 at 0, terminator bytes at 1..2, cursor at 3 when checked
    const error = thrown(() => readAttributeBlock(new ByteCursor(Buffer.from([0x00, 0x02, 0x00])), NAMES));
    expect(error).toBeInstanceOf(FormatError);
    expect(error).toHaveProperty('offset', 3);
    expect(error).toHaveProperty('message', 'Unexpected attribute block terminator 0200 (at offset 3)');
  });

  it('reports an unknown type code at its own offset', () => {
    const error = thrown(() => readAttributeBlock(new ByteCursor(Buffer.from([0x01, 0x00, 0x07, 0x00])), NAMES));
    expect(error).toBeInstanceOf(FormatError);
    expect(error).toHaveProperty('offset', 2);
  });

  it('rejects a name id outside the table', () => {
    const bytes = block([9, 0x02, u32(1)]);
    expect(() => readAttributeBlock(new ByteCursor(bytes), NAMES)).toThrow('Attribute name id 9 outside table of 5 (at offset 1)');
  });

  it('rejects a matrix longer than the remaining bytes', () => {
    const bytes = Buffer.concat([Buffer.from([0x01, 0x01, 0x06]), u32(1000), f32(1)]);
    expect(() => readAttributeBlock(new ByteCursor(bytes), NAMES)).toThrow('Matrix of 1000 floats exceeds the 4 remaining bytes (at offset 3)');
  });

  it('fails on a truncated payload', () => {
    expect(() => readAttributeBlock(new ByteCursor(Buffer.from([0x01, 0x00, 0x02, 0x01, 0x00])), NAMES)).toThrow(FormatError);
  });
});

describe('readAttributeBlocks', () => {
  it('reads one block per tag', () => {
    const bytes = Buffer.concat([block([0, 0x02, u32(7)]), block(), block([2, 0x01, cstr('x')])]);
    const blocks = readAttributeBlocks(new ByteCursor(bytes), 3, NAMES);
    expect(blocks.map((attributes) => [...attributes])).toEqual([[['id', '7']], [], [['name', 'x']]]);
  });
});
