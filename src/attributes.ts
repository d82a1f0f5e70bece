/**
 * Per-element attribute blocks.
 *
 * Each block is a one-byte attribute count, then for every attribute a
 * one-byte name id, a one-byte type code and the typed payload, and finally
 * the two-byte terminator `01 00`.
 */
import { ATTRIBUTE_BLOCK_TERMINATOR, ATTRIBUTE_TYPE_CODE, type AttributeTypeCode } from './constants/format.js';
import { FormatError } from './errors.js';
import type { AttributeKind, AttributeValue } from './types/attribute-value.js';
import type { AttributeMap } from './types/element-node.js';
import { ByteCursor } from './utils/byte-cursor.js';
import type { NameTable } from './utils/name-table.js';

const MATRIX_DIGITS = 4;

/**
 * Maps a stored type code to its attribute kind.
 * @throws {FormatError} For any code outside the closed set
 */
export function attributeKindForCode(code: number, offset: number): AttributeKind {
  switch (code) {
    case ATTRIBUTE_TYPE_CODE.STRING:
    case ATTRIBUTE_TYPE_CODE.STRING_ALT:
      return 'string';
    case ATTRIBUTE_TYPE_CODE.UINT32:
      return 'uint32';
    case ATTRIBUTE_TYPE_CODE.INT32:
      return 'int32';
    case ATTRIBUTE_TYPE_CODE.MATRIX:
      return 'matrix';
    case ATTRIBUTE_TYPE_CODE.UINT64:
      return 'uint64';
    default:
      throw new FormatError(`Unknown attribute type code 0x${code.toString(16).padStart(2, '0').toUpperCase()}`, offset);
  }
}

export function typeCodeForKind(kind: AttributeKind): AttributeTypeCode {
  switch (kind) {
    case 'string':
      return ATTRIBUTE_TYPE_CODE.STRING;
    case 'uint32':
      return ATTRIBUTE_TYPE_CODE.UINT32;
    case 'int32':
      return ATTRIBUTE_TYPE_CODE.INT32;
    case 'matrix':
      return ATTRIBUTE_TYPE_CODE.MATRIX;
    case 'uint64':
      return ATTRIBUTE_TYPE_CODE.UINT64;
  }
}

/**
 * Reads one typed payload.
 */
export function readAttributeValue(cursor: ByteCursor, kind: AttributeKind): AttributeValue {
  switch (kind) {
    case 'string':
      return { kind, value: cursor.readCString() };
    case 'uint32':
      return { kind, value: cursor.readUint32() };
    case 'int32':
      return { kind, value: cursor.readInt32() };
    case 'uint64':
      return { kind, value: cursor.readUint64() };
    case 'matrix': {
      const countOffset: number = cursor.offset;
      const count: number = cursor.readUint32();
      if (count * 4 > cursor.remaining) {
        throw new FormatError(`Matrix of ${count} floats exceeds the ${cursor.remaining} remaining bytes`, countOffset);
      }
      const values: number[] = [];
      for (let i = 0; i < count; i++) {
        values.push(cursor.readFloat32());
      }
      return { kind, value: values };
    }
  }
}

/**
 * Formats a number with four decimals, rounding exact ties to even and
 * spelling signed zero and non-finite values the way the legacy exporter did.
 */
export function formatFixed4(value: number): string {
  if (Number.isNaN(value)) {
    return 'nan';
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? 'inf' : '-inf';
  }
  const sign: string = value < 0 || Object.is(value, -0) ? '-' : '';
  const magnitude: number = Math.abs(value);
  if (magnitude >= 1e21) {
    return `${sign}${BigInt(magnitude)}.${'0'.repeat(MATRIX_DIGITS)}`;
  }
  let rounded: string = magnitude.toFixed(MATRIX_DIGITS);
  const exact: string = magnitude.toFixed(40);
  const cut: number = exact.indexOf('.') + 1 + MATRIX_DIGITS;
  // toFixed rounds exact halves away from zero
  if (/^50*$/.test(exact.slice(cut))) {
    const truncated: string = exact.slice(0, cut);
    if (Number(truncated[truncated.length - 1]) % 2 === 0) {
      rounded = truncated;
    }
  }
  return `${sign}${rounded}`;
}

/**
 * Canonical text form of an attribute value.
 */
export function formatAttributeValue(attribute: AttributeValue): string {
  switch (attribute.kind) {
    case 'string':
      return attribute.value;
    case 'uint32':
    case 'int32':
      return String(attribute.value);
    case 'uint64':
      return attribute.value.toString();
    case 'matrix':
      return attribute.value.map(formatFixed4).join(',');
  }
}

function readTerminator(cursor: ByteCursor): void {
  const terminator: Buffer = cursor.readBytes(ATTRIBUTE_BLOCK_TERMINATOR.length);
  if (!terminator.equals(ATTRIBUTE_BLOCK_TERMINATOR)) {
    throw new FormatError(`Unexpected attribute block terminator ${terminator.toString('hex')}`, cursor.offset);
  }
}

/**
 * Reads the attribute block of a single element.
 */
export function readAttributeBlock(cursor: ByteCursor, attributeNames: NameTable): AttributeMap {
  const attributes: AttributeMap = new Map();
  const count: number = cursor.readUint8();
  for (let i = 0; i < count; i++) {
    const nameOffset: number = cursor.offset;
    const nameId: number = cursor.readUint8();
    if (nameId >= attributeNames.length) {
      throw new FormatError(`Attribute name id ${nameId} outside table of ${attributeNames.length}`, nameOffset);
    }
    const kind: AttributeKind = attributeKindForCode(cursor.readUint8(), cursor.offset - 1);
    attributes.set(attributeNames[nameId], formatAttributeValue(readAttributeValue(cursor, kind)));
  }
  readTerminator(cursor);
  return attributes;
}

/**
 * Reads one attribute block per tag, in tag order.
 */
export function readAttributeBlocks(cursor: ByteCursor, tagCount: number, attributeNames: NameTable): AttributeMap[] {
  const blocks: AttributeMap[] = [];
  for (let index = 0; index < tagCount; index++) {
    blocks.push(readAttributeBlock(cursor, attributeNames));
  }
  return blocks;
}
