import SipHash from 'siphash';
import { SecretKeyError } from '../errors.js';

export const SIPHASH_KEY_SIZE = 16;

/**
 * SipHash-2-4 over `message` with a 16-byte key, returned as an unsigned 64-bit value.
 */
export function siphash24(key: Uint8Array, message: Uint8Array): bigint {
  if (key.length !== SIPHASH_KEY_SIZE) {
    throw new SecretKeyError(`SipHash key must be ${SIPHASH_KEY_SIZE} bytes`, key.length);
  }

  // The library takes the key as four little-endian 32-bit words
  const view = new DataView(key.buffer, key.byteOffset, key.byteLength);
  const words = [0, 4, 8, 12].map((offset) => view.getUint32(offset, true));

  const { h, l } = SipHash.hash(words, message);
  return (BigInt(h >>> 0) << 32n) | BigInt(l >>> 0);
}

/**
 * Six decimal digits derived from a SipHash value: the low 32 bits reduced mod 10^6.
 */
export function siphashDigits(key: Uint8Array, message: Uint8Array): number {
  return Number(siphash24(key, message) & 0xffffffffn) % 1_000_000;
}
