/**
 * Bounds-checked little-endian reader over an in-memory buffer.
 */
import { EncodingError, FormatError } from '../errors.js';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

const SAFE_INTEGER_BITS = 53;

/**
 * Decodes strict UTF-8, reporting the raw bytes when they are not valid text.
 */
export function decodeUtf8(bytes: Uint8Array, offset: number): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch (error) {
    throw new EncodingError('Invalid UTF-8 sequence', offset, Uint8Array.from(bytes), error);
  }
}

/**
 * Encodes an unsigned integer as base-128 groups, lowest group first,
 * with the high bit set on every byte but the last.
 */
export function encodeVarUint(value: number | bigint): Buffer {
  let remaining: bigint = BigInt(value);
  if (remaining < 0n) {
    throw new RangeError(`Cannot encode negative value ${remaining} as a variable-length integer`);
  }
  const bytes: number[] = [];
  do {
    let byte = Number(remaining & 0x7fn);
    remaining >>= 7n;
    if (remaining !== 0n) {
      byte |= 0x80;
    }
    bytes.push(byte);
  } while (remaining !== 0n);
  return Buffer.from(bytes);
}

/**
 * Read position into an immutable buffer. Every read advances the position
 * and fails with a FormatError when too few bytes remain.
 */
export class ByteCursor {
  private position: number;

  constructor(private readonly buffer: Buffer, start = 0) {
    this.position = start;
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.buffer.length - this.position;
  }

  get length(): number {
    return this.buffer.length;
  }

  readUint8(): number {
    this.require(1);
    const value: number = this.buffer.readUInt8(this.position);
    this.position += 1;
    return value;
  }

  readUint16(): number {
    this.require(2);
    const value: number = this.buffer.readUInt16LE(this.position);
    this.position += 2;
    return value;
  }

  readUint32(): number {
    this.require(4);
    const value: number = this.buffer.readUInt32LE(this.position);
    this.position += 4;
    return value;
  }

  readInt32(): number {
    this.require(4);
    const value: number = this.buffer.readInt32LE(this.position);
    this.position += 4;
    return value;
  }

  readUint64(): bigint {
    this.require(8);
    const value: bigint = this.buffer.readBigUInt64LE(this.position);
    this.position += 8;
    return value;
  }

  readFloat32(): number {
    this.require(4);
    const value: number = this.buffer.readFloatLE(this.position);
    this.position += 4;
    return value;
  }

  /**
   * Returns the next `count` bytes as a view into the underlying buffer.
   */
  readBytes(count: number): Buffer {
    this.require(count);
    const slice: Buffer = this.buffer.subarray(this.position, this.position + count);
    this.position += count;
    return slice;
  }

  /**
   * Reads a variable-length unsigned integer of any length.
   */
  readVarUintBig(): bigint {
    const start: number = this.position;
    let value = 0n;
    let shift = 0n;
    for (;;) {
      if (this.position >= this.buffer.length) {
        throw new FormatError(`Variable-length integer starting at ${start} is truncated`, this.position);
      }
      const byte: number = this.buffer[this.position];
      this.position += 1;
      value |= BigInt(byte & 0x7f) << shift;
      if ((byte & 0x80) === 0) {
        return value;
      }
      shift += 7n;
    }
  }

  /**
   * Reads a variable-length unsigned integer used as a count or an index.
   */
  readVarUint(): number {
    const start: number = this.position;
    let value = 0;
    let shift = 0;
    for (;;) {
      if (this.position >= this.buffer.length) {
        throw new FormatError(`Variable-length integer starting at ${start} is truncated`, this.position);
      }
      const byte: number = this.buffer[this.position];
      const group: number = byte & 0x7f;
      // Zero groups past bit 53 are padding; anything else overflows.
      if (group !== 0) {
        value += shift < SAFE_INTEGER_BITS ? group * 2 ** shift : Infinity;
        if (value > Number.MAX_SAFE_INTEGER) {
          throw new FormatError(`Variable-length integer starting at ${start} does not fit a safe integer`, this.position);
        }
      }
      this.position += 1;
      if ((byte & 0x80) === 0) {
        return value;
      }
      shift += 7;
    }
  }

  /**
   * Absolute offset of the next occurrence of `value`, or -1.
   */
  find(value: number): number {
    return this.buffer.indexOf(value, this.position);
  }

  /**
   * Reads bytes up to the next zero byte and decodes them as UTF-8.
   * The terminator is consumed but not returned.
   */
  readCString(): string {
    const start: number = this.position;
    const end: number = this.find(0);
    if (end === -1) {
      throw new FormatError(`Unterminated string starting at ${start}`, this.buffer.length);
    }
    const text: string = decodeUtf8(this.buffer.subarray(start, end), start);
    this.position = end + 1;
    return text;
  }

  private require(count: number): void {
    if (count < 0 || this.position + count > this.buffer.length) {
      throw new FormatError(`${count} byte(s) needed, ${this.remaining} available`, this.position);
    }
  }
}
