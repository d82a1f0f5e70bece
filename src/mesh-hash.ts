/**
 * Case-insensitive 32-bit content hash used to look resources up by name.
 * Not collision resistant.
 */

const MASK32 = 0xffffffffn;
const MASK64 = 0xffffffffffffffffn;

const TRAILER_WORDS: readonly bigint[] = [0x9be74448n, 0x66f42c48n];
const INITIAL_HASH = 0xf4fa8928n;
const INITIAL_STATE = 0x37a8470en;
const INITIAL_TWEAK = 0x7758b42bn;
const ROUND_SEED = 0x267b0b11n;

/**
 * Lowercases the text, keeps its ASCII characters and packs them into
 * little-endian 32-bit words, zero-padding the last one.
 */
export function meshHashWords(text: string): bigint[] {
  const ascii: number[] = [];
  for (const char of text.toLowerCase()) {
    const code: number = char.charCodeAt(0);
    if (code < 0x80) {
      ascii.push(code);
    }
  }
  const padded: Buffer = Buffer.alloc(Math.ceil(ascii.length / 4) * 4);
  padded.set(ascii);

  const words: bigint[] = [];
  for (let offset = 0; offset < padded.length; offset += 4) {
    words.push(BigInt(padded.readUInt32LE(offset)));
  }
  return words;
}

function low(value: bigint): bigint {
  return value & MASK32;
}

function high(value: bigint): bigint {
  return value >> 32n;
}

/**
 * Hashes a resource name.
 */
export function meshHash(text: string): number {
  let hash: bigint = INITIAL_HASH;
  let state: bigint = INITIAL_STATE;
  let tweak: bigint = INITIAL_TWEAK;

  for (const word of [...meshHashWords(text), ...TRAILER_WORDS]) {
    hash = low((hash << 1n) | (hash >> 31n));
    const e: bigint = ROUND_SEED ^ hash;

    state ^= word;
    tweak ^= word;

    // state' = lo(state * m) + hi(state * m), each half bumped when the other is nonzero
    const stateMultiplier: bigint = ((e + tweak) | 0x02040801n) & 0xbfef7fdfn;
    let product: bigint = (stateMultiplier * state) & MASK64;
    let a: bigint = low(product);
    let b: bigint = high(product);
    if (b !== 0n) {
      a = low(a + 1n);
    }
    let sum: bigint = (a + b) & MASK64;
    a = low(sum);
    if (high(sum) !== 0n) {
      a = low(a + 1n);
    }

    const tweakMultiplier: bigint = ((e + state) | 0x00804021n) & 0x7dfefbffn;
    state = a;

    // tweak' = lo(tweak * m) + 2 * hi(tweak * m), with the doubled half's overflow carried
    product = (tweak * tweakMultiplier) & MASK64;
    a = low(product);
    b = high(product);
    sum = (b + b) & MASK64;
    b = low(sum);
    if (high(sum) !== 0n) {
      a = low(a + 1n);
    }
    sum = (a + b) & MASK64;
    a = low(sum);
    if (high(sum) !== 0n) {
      a = low(a + 2n);
    }
    tweak = a;
  }

  return Number(low(state ^ tweak));
}

/**
 * Formats a hash the way resource listings print it, e.g. `0x0000ABCD`.
 */
export function formatHash(value: number): string {
  return `0x${(value >>> 0).toString(16).toUpperCase().padStart(8, '0')}`;
}
