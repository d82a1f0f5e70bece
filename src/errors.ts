/**
 * Error types raised while decoding tag-tree containers.
 */

/**
 * Base class for every failure surfaced by the decoder.
 */
export class TagTreeError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'TagTreeError';
  }
}

/**
 * Malformed header, truncated input, bad terminator or unknown attribute type.
 * `offset` is the byte position where the problem was detected.
 */
export class FormatError extends TagTreeError {
  constructor(message: string, public readonly offset: number, cause?: unknown) {
    super(`${message} (at offset ${offset})`, cause);
    this.name = 'FormatError';
  }
}

/**
 * A name or string field that is not valid UTF-8.
 */
export class EncodingError extends TagTreeError {
  constructor(message: string, public readonly offset: number, public readonly raw: Uint8Array, cause?: unknown) {
    super(`${message} (at offset ${offset}, bytes ${Buffer.from(raw).toString('hex')})`, cause);
    this.name = 'EncodingError';
  }
}
