/**
 * Immutable fixed-length bit string, most significant bit first.
 * `value` never has bits set at or above `length`.
 */
export interface BitString {
  readonly value: bigint;
  readonly length: number;
}

export const EMPTY_BITS: BitString = { value: 0n, length: 0 };

function mask(length: number): bigint {
  return (1n << BigInt(length)) - 1n;
}

/**
 * Bit string of `width` bits holding an unsigned value.
 * Throws RangeError when the value does not fit; callers validate first.
 */
export function uintToBits(value: number | bigint, width: number): BitString {
  const big = BigInt(value);
  if (big < 0n || big > mask(width)) {
    throw new RangeError(`Value ${value} does not fit in ${width} bits`);
  }
  return { value: big, length: width };
}

export function concatBits(...parts: BitString[]): BitString {
  let value = 0n;
  let length = 0;
  for (const part of parts) {
    value = (value << BigInt(part.length)) | part.value;
    length += part.length;
  }
  return { value, length };
}

/**
 * Bits `[start, end)` counted from the most significant end.
 */
export function sliceBits(bits: BitString, start: number, end: number = bits.length): BitString {
  if (start < 0 || end > bits.length || start > end) {
    throw new RangeError(`Invalid slice [${start}, ${end}) of ${bits.length} bits`);
  }
  const length = end - start;
  return { value: (bits.value >> BigInt(bits.length - end)) & mask(length), length };
}

export function xorBits(a: BitString, b: BitString): BitString {
  if (a.length !== b.length) {
    throw new RangeError(`Bit length mismatch: ${a.length} != ${b.length}`);
  }
  return { value: a.value ^ b.value, length: a.length };
}

/**
 * Pack into bytes, zero-padding on the left to a whole number of bytes.
 */
export function bitsToBytes(bits: BitString): Uint8Array {
  const bytes = new Uint8Array(Math.ceil(bits.length / 8));
  let value = bits.value;
  for (let i = bytes.length - 1; i >= 0; i--) {
    bytes[i] = Number(value & 0xffn);
    value >>= 8n;
  }
  return bytes;
}

export function bytesToBits(bytes: Uint8Array): BitString {
  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  return { value, length: bytes.length * 8 };
}

/**
 * Render as a string of '0' and '1'.
 */
export function bitsToString(bits: BitString): string {
  if (bits.length === 0) return '';
  return bits.value.toString(2).padStart(bits.length, '0');
}

export function bitsFromString(text: string): BitString {
  if (!/^[01]*$/.test(text)) {
    throw new RangeError(`Not a bit string: ${text}`);
  }
  return { value: text.length === 0 ? 0n : BigInt(`0b${text}`), length: text.length };
}
