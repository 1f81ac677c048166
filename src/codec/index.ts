export {
  EMPTY_BITS,
  uintToBits,
  concatBits,
  sliceBits,
  xorBits,
  bitsToBytes,
  bytesToBits,
  bitsToString,
  bitsFromString,
  type BitString,
} from './bits.js';

export {
  MAX_ID,
  encodeBody,
  encodePassthroughBody,
  validateId,
  type Body,
  type PassthroughBody,
  type FieldValue,
  type FieldValues,
} from './body.js';

export {
  dammCheckDigit,
  weightedMod5CheckDigit,
  checkDigit,
  interleaveCheckDigits,
  checkDigitCount,
} from './checksum.js';

export {
  formatKeycode,
  toFixedDigits,
  keycodeDigits,
  hasValidCheckDigits,
  type FormatOptions,
} from './keycode.js';
