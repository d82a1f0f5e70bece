/**
 * Rotor-wrapped archive entries. The entry is a rotor-encrypted zlib stream;
 * the inflated bytes have their first 128 bytes XOR-masked and are stored
 * back to front.
 */
import { deflateSync, inflateSync } from 'node:zlib';
import { ARCHIVE_ROTOR_KEY, ROTOR_PAYLOAD_MARKERS, ROTOR_PAYLOAD_MASK, ROTOR_PAYLOAD_MASKED_PREFIX } from './constants/format.js';
import { FormatError } from './errors.js';
import { type RotorKey, rotorDecrypt, rotorEncrypt } from './rotor-cipher.js';

/**
 * XORs the first bytes with the payload mask.
 */
function maskPrefix(data: Buffer): Buffer {
  const masked: Buffer = Buffer.from(data);
  const end: number = Math.min(ROTOR_PAYLOAD_MASKED_PREFIX, masked.length);
  for (let i = 0; i < end; i++) {
    masked[i] ^= ROTOR_PAYLOAD_MASK;
  }
  return masked;
}

export function isRotorPayload(data: Uint8Array): boolean {
  if (data.length < 2) {
    return false;
  }
  const head: Buffer = Buffer.from(data.subarray(0, 2));
  return ROTOR_PAYLOAD_MARKERS.some((marker: Buffer) => marker.equals(head));
}

/**
 * Decrypts, inflates and unscrambles a rotor-wrapped entry. Without a key the
 * archive format's own key is used.
 * @throws {FormatError} If the decrypted bytes are not a zlib stream
 */
export function unpackRotorPayload(data: Uint8Array, key: RotorKey = ARCHIVE_ROTOR_KEY): Buffer {
  const compressed: Buffer = rotorDecrypt(key, data);
  let inflated: Buffer;
  try {
    inflated = inflateSync(compressed);
  } catch (error) {
    throw new FormatError(`Rotor payload did not inflate: ${error instanceof Error ? error.message : String(error)}`, 0, error);
  }
  return maskPrefix(inflated).reverse();
}

/**
 * Inverse of {@link unpackRotorPayload}.
 */
export function packRotorPayload(data: Uint8Array, key: RotorKey = ARCHIVE_ROTOR_KEY): Buffer {
  const scrambled: Buffer = maskPrefix(Buffer.from(data).reverse());
  return rotorEncrypt(key, deflateSync(scrambled));
}
