import { EncodingOverflowError, SchemaMismatchError } from '../errors.js';
import type { AuthenticatedPayload } from '../crypto/auth.js';
import { pseudorandomBits } from '../crypto/utils.js';
import { FAMILIES, getMessageDefinition } from '../protocol/registry.js';
import type { KeycodeFamily } from '../protocol/types.js';
import { concatBits, xorBits } from './bits.js';
import { checkDigit, interleaveCheckDigits } from './checksum.js';

export interface FormatOptions {
  /**
   * XOR the body with a stream seeded by the digest so that consecutive
   * codes do not share visible prefixes. The device must be built to match.
   */
  obscure?: boolean;
}

const FULL_GROUP_SIZE = 3;

/**
 * Render an authenticated payload as a keycode.
 *
 * Body and digest form one integer (MSB first) which is written in the
 * family's base, left-padded to the type's digit count. Check digits are
 * interleaved, then the family framing is applied.
 */
export function formatKeycode(
  payload: AuthenticatedPayload,
  family: KeycodeFamily,
  options: FormatOptions = {}
): string {
  const definition = getMessageDefinition(payload.type);
  if (definition.family !== family) {
    throw new SchemaMismatchError(`${payload.type} belongs to the ${definition.family} family, not ${family}`, {
      type: payload.type,
      family,
    });
  }
  if (payload.digest.length !== definition.authWidth) {
    throw new SchemaMismatchError(`Digest of ${payload.type} must be ${definition.authWidth} bits`, {
      type: payload.type,
    });
  }

  const familyDefinition = FAMILIES[family];
  const body = options.obscure
    ? xorBits(payload.body.bits, pseudorandomBits(payload.digest, payload.body.bits.length))
    : payload.body.bits;
  const combined = concatBits(body, payload.digest);

  const data = toFixedDigits(combined.value, familyDefinition.base, definition.digits);
  if (!data) {
    throw new EncodingOverflowError(payload.type, definition.digits);
  }

  const digits = interleaveCheckDigits(data, familyDefinition.checksum, familyDefinition.checkInterval);
  const text = digits.map((digit) => familyDefinition.alphabet[digit]).join('');

  return family === 'full' ? frameFull(text) : text;
}

/**
 * Digits of `value` in `base`, most significant first, left-padded to
 * `width`. Undefined when the value needs more digits.
 */
export function toFixedDigits(value: bigint, base: number, width: number): number[] | undefined {
  const bigBase = BigInt(base);
  const digits = new Array<number>(width).fill(0);
  let rest = value;
  for (let i = width - 1; i >= 0 && rest > 0n; i--) {
    digits[i] = Number(rest % bigBase);
    rest /= bigBase;
  }
  return rest === 0n ? digits : undefined;
}

/**
 * `*` + clusters of three joined by single spaces + `#`
 */
function frameFull(text: string): string {
  const groups: string[] = [];
  for (let i = 0; i < text.length; i += FULL_GROUP_SIZE) {
    groups.push(text.slice(i, i + FULL_GROUP_SIZE));
  }
  return `*${groups.join(' ')}#`;
}

/**
 * Keycode characters as digit values, with framing removed.
 */
export function keycodeDigits(keycode: string, family: KeycodeFamily): number[] {
  const { alphabet } = FAMILIES[family];
  const stripped = family === 'full' ? keycode.replace(/[*# ]/g, '') : keycode;
  return Array.from(stripped, (char) => {
    const digit = alphabet.indexOf(char);
    if (digit < 0) {
      throw new SchemaMismatchError(`Character "${char}" is not in the ${family} alphabet`, { family });
    }
    return digit;
  });
}

/**
 * Whether every interleaved check digit of a keycode matches its data digits.
 */
export function hasValidCheckDigits(keycode: string, family: KeycodeFamily): boolean {
  const { checkInterval, checksum } = FAMILIES[family];
  const digits = keycodeDigits(keycode, family);
  const data: number[] = [];

  for (let i = 0; i < digits.length; i += checkInterval + 1) {
    const block = digits.slice(i, i + checkInterval + 1);
    if (block.length < 2) return false;
    data.push(...block.slice(0, -1));
    if (block[block.length - 1] !== checkDigit(checksum, data)) return false;
  }
  return true;
}
