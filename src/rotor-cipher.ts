/**
 * Rotor stream cipher.
 *
 * A key is folded into three seeds for a Wichmann-Hill style generator, which
 * then shuffles one permutation per rotor. Each byte passes through every rotor
 * and the rotor positions advance like an odometer after each byte.
 */
import { DEFAULT_ROTOR_COUNT, ROTOR_SIZE } from './constants/format.js';

export type RotorKey = string | Uint8Array;

const MODULI = [30269, 30307, 30323] as const;

/** Floor division and modulo with the sign of the divisor. */
function floorDiv(value: number, divisor: number): number {
  return Math.floor(value / divisor);
}

function floorMod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

function keyCodes(key: RotorKey): number[] {
  if (typeof key === 'string') {
    return Array.from(key, (char: string) => char.codePointAt(0) ?? 0);
  }
  return Array.from(key);
}

/**
 * Combined multiplicative congruential generator over the moduli
 * 30269, 30307 and 30323. Each instance owns its state.
 */
export class WichmannHillGenerator {
  private x: number;
  private y: number;
  private z: number;

  constructor(x: number, y: number, z: number) {
    this.x = x;
    this.y = y;
    this.z = z;
  }

  /**
   * Derives the generator seeds from a key.
   */
  static fromKey(key: RotorKey): WichmannHillGenerator {
    const mask = 0xffff;
    let x = 995;
    let y = 576;
    let z = 767;
    for (const code of keyCodes(key)) {
      x = (((x << 3) | (x >> 13)) + code) & mask;
      y = (((y << 3) | (y >> 13)) ^ code) & mask;
      z = (((z << 3) | (z >> 13)) - code) & mask;
    }

    // Reinterpret as signed 16-bit.
    const maxPositive = mask >> 1;
    if (x > maxPositive) x -= mask + 1;
    if (y > maxPositive) y -= mask + 1;
    if (z > maxPositive) z -= mask + 1;

    y |= 1;

    x = 171 * floorMod(x, 177) - 2 * floorDiv(x, 177);
    y = 172 * floorMod(y, 176) - 35 * floorDiv(y, 176);
    z = 170 * floorMod(z, 178) - 63 * floorDiv(z, 178);
    if (x < 0) x += MODULI[0];
    if (y < 0) y += MODULI[1];
    if (z < 0) z += MODULI[2];

    return new WichmannHillGenerator(x, y, z);
  }

  /**
   * Returns an integer in [0, bound) and advances the state.
   */
  next(bound: number): number {
    const sample: number = this.x / MODULI[0] + this.y / MODULI[1] + this.z / MODULI[2];
    this.x = (171 * this.x) % MODULI[0];
    this.y = (172 * this.y) % MODULI[1];
    this.z = (170 * this.z) % MODULI[2];
    return Math.floor(sample * bound) % bound;
  }
}

/**
 * Rotor permutations derived from one key. Slot `ROTOR_SIZE` of every
 * permutation holds that rotor's odometer increment.
 */
export interface RotorTables {
  readonly encrypt: readonly Uint8Array[];
  readonly decrypt: readonly Uint8Array[];
  readonly positions: Uint8Array;
}

/**
 * Builds the rotor tables for a key.
 */
export function buildRotorTables(key: RotorKey, rotorCount: number = DEFAULT_ROTOR_COUNT): RotorTables {
  const size: number = ROTOR_SIZE;
  const rand: WichmannHillGenerator = WichmannHillGenerator.fromKey(key);
  const encrypt: Uint8Array[] = [];
  const decrypt: Uint8Array[] = [];
  const positions = new Uint8Array(rotorCount);

  for (let rotor = 0; rotor < rotorCount; rotor++) {
    positions[rotor] = rand.next(size);
    const erotor = new Uint8Array(size + 1);
    const drotor = new Uint8Array(size + 1);
    for (let slot = 0; slot < size; slot++) {
      erotor[slot] = slot;
      drotor[slot] = slot;
    }
    const increment: number = 1 + 2 * rand.next(size / 2);
    erotor[size] = increment;
    drotor[size] = increment;

    let i: number = size;
    while (i > 1) {
      const r: number = rand.next(i);
      i -= 1;
      const picked: number = erotor[r];
      erotor[r] = erotor[i];
      erotor[i] = picked;
      drotor[picked] = i;
    }
    drotor[erotor[0]] = 0;

    encrypt.push(erotor);
    decrypt.push(drotor);
  }

  return { encrypt, decrypt, positions };
}

/**
 * Advances every rotor, carrying into the next one when a position wraps.
 */
function advance(positions: Uint8Array, tables: readonly Uint8Array[], size: number): void {
  let next = 0;
  for (let i = 0; i < positions.length; i++) {
    const carry: number = next >= size ? 1 : 0;
    next = ((positions[i] + carry) % size) + tables[i][size];
    positions[i] = next % size;
  }
}

/**
 * Rotor cipher bound to one key. Encryption and decryption keep separate
 * positions, each starting from the key's initial positions and continuing
 * across calls, so a stream can be processed in chunks.
 *
 * Instances mutate their positions and must not be shared between
 * concurrent streams.
 */
export class RotorCipher {
  private tables: RotorTables | null = null;
  private encryptPositions: Uint8Array | null = null;
  private decryptPositions: Uint8Array | null = null;

  constructor(private readonly key: RotorKey, private readonly rotorCount: number = DEFAULT_ROTOR_COUNT) {
    if (!Number.isInteger(rotorCount) || rotorCount < 1) {
      throw new RangeError(`Rotor count must be a positive integer, got ${rotorCount}`);
    }
  }

  encrypt(input: Uint8Array): Buffer {
    const tables: RotorTables = this.rotorTables();
    if (this.encryptPositions === null) {
      this.encryptPositions = Uint8Array.from(tables.positions);
    }
    const positions: Uint8Array = this.encryptPositions;
    const output: Buffer = Buffer.alloc(input.length);

    for (let index = 0; index < input.length; index++) {
      let c: number = input[index];
      for (let i = 0; i < this.rotorCount; i++) {
        c = tables.encrypt[i][c ^ positions[i]];
      }
      output[index] = c;
      advance(positions, tables.encrypt, ROTOR_SIZE);
    }
    return output;
  }

  decrypt(input: Uint8Array): Buffer {
    const tables: RotorTables = this.rotorTables();
    if (this.decryptPositions === null) {
      this.decryptPositions = Uint8Array.from(tables.positions);
    }
    const positions: Uint8Array = this.decryptPositions;
    const output: Buffer = Buffer.alloc(input.length);

    for (let index = 0; index < input.length; index++) {
      let c: number = input[index];
      for (let i = this.rotorCount - 1; i >= 0; i--) {
        c = positions[i] ^ tables.decrypt[i][c];
      }
      output[index] = c;
      advance(positions, tables.decrypt, ROTOR_SIZE);
    }
    return output;
  }

  /**
   * Returns both directions to the initial rotor positions.
   */
  reset(): void {
    this.encryptPositions = null;
    this.decryptPositions = null;
  }

  /**
   * The key's rotor tables, derived on first use.
   */
  rotorTables(): RotorTables {
    if (this.tables === null) {
      this.tables = buildRotorTables(this.key, this.rotorCount);
    }
    return this.tables;
  }
}

/** Encrypts a whole buffer with a fresh cipher. */
export function rotorEncrypt(key: RotorKey, input: Uint8Array, rotorCount: number = DEFAULT_ROTOR_COUNT): Buffer {
  return new RotorCipher(key, rotorCount).encrypt(input);
}

/** Decrypts a whole buffer with a fresh cipher. */
export function rotorDecrypt(key: RotorKey, input: Uint8Array, rotorCount: number = DEFAULT_ROTOR_COUNT): Buffer {
  return new RotorCipher(key, rotorCount).decrypt(input);
}
