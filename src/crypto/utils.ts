import { bytesToHex, concatBytes, hexToBytes } from '@noble/hashes/utils';
import { bitsToBytes, bytesToBits, concatBits, sliceBits, type BitString, EMPTY_BITS } from '../codec/bits.js';
import { siphash24, SIPHASH_KEY_SIZE } from './siphash.js';

export { bytesToHex, concatBytes, hexToBytes };

/** All-zero key used by the Full factory types and the pseudorandom stream */
export const ZERO_KEY = new Uint8Array(SIPHASH_KEY_SIZE);

/** All-ones key used by the Small factory test type */
export const ONES_KEY = new Uint8Array(SIPHASH_KEY_SIZE).fill(0xff);

/**
 * Little-endian encoding of an unsigned integer in `size` bytes
 */
export function uintLE(value: number, size: 1 | 2 | 4): Uint8Array {
  const bytes = new Uint8Array(size);
  const view = new DataView(bytes.buffer);
  if (size === 1) view.setUint8(0, value);
  else if (size === 2) view.setUint16(0, value, true);
  else view.setUint32(0, value, true);
  return bytes;
}

/**
 * Little-endian uint64 bytes of a SipHash value
 */
function uint64LE(value: bigint): Uint8Array {
  const bytes = new Uint8Array(8);
  new DataView(bytes.buffer).setBigUint64(0, value, true);
  return bytes;
}

/**
 * Deterministic bit stream seeded by `seed`.
 *
 * Chunk `i` is SipHash-2-4 under the zero key over `i ‖ seed bytes`,
 * laid out as little-endian bytes. The first `length` bits are returned.
 */
export function pseudorandomBits(seed: BitString, length: number): BitString {
  const seedBytes = bitsToBytes(seed);
  let stream = EMPTY_BITS;
  for (let counter = 0; stream.length < length; counter++) {
    if (counter > 0xff) {
      throw new RangeError(`Pseudorandom stream too long: ${length} bits`);
    }
    const chunk = siphash24(ZERO_KEY, concatBytes(new Uint8Array([counter]), seedBytes));
    stream = concatBits(stream, bytesToBits(uint64LE(chunk)));
  }
  return sliceBits(stream, 0, length);
}
