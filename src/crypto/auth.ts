import { FieldRangeError, IdCollisionError, SchemaMismatchError, SecretKeyError } from '../errors.js';
import { bitsToBytes, sliceBits, type BitString } from '../codec/bits.js';
import { MAX_ID, validateId, type Body } from '../codec/body.js';
import { getCollisionRules, type CollisionRule } from '../protocol/collisions.js';
import { getMessageDefinition } from '../protocol/registry.js';
import type { MessageDefinition, MessageType } from '../protocol/types.js';
import { siphash24, SIPHASH_KEY_SIZE } from './siphash.js';
import { concatBytes, ONES_KEY, uintLE, ZERO_KEY } from './utils.js';

/**
 * Body bound to its id by a truncated keyed digest.
 */
export interface AuthenticatedPayload {
  readonly type: MessageType;
  readonly id: number;
  readonly body: Body;
  readonly digest: BitString;
}

/**
 * Select the SipHash key for a definition. Device keys longer than 16 bytes
 * contribute only their first 16.
 */
export function resolveAuthKey(definition: MessageDefinition, secretKey: Uint8Array): Uint8Array {
  switch (definition.keying) {
    case 'zero':
      return ZERO_KEY;
    case 'ones':
      return ONES_KEY;
    case 'device':
      if (secretKey.length < SIPHASH_KEY_SIZE) {
        throw new SecretKeyError(`Secret key must be at least ${SIPHASH_KEY_SIZE} bytes`, secretKey.length);
      }
      return secretKey.subarray(0, SIPHASH_KEY_SIZE);
  }
}

/**
 * Truncated digest of `uint32 LE id ‖ authTag ‖ body bytes`: the top
 * `authWidth` bits of SipHash-2-4.
 */
export function computeDigest(
  definition: MessageDefinition,
  id: number,
  body: BitString,
  key: Uint8Array
): BitString {
  const input = concatBytes(uintLE(id, 4), uintLE(definition.authTag, 1), bitsToBytes(body));
  const hash = siphash24(key, input);
  return sliceBits({ value: hash, length: 64 }, 0, definition.authWidth);
}

/**
 * Authenticate a body under `id`.
 *
 * Throws IdCollisionError when the resulting code would also be read as a
 * different command. The caller retries with `nextId`; this function never
 * picks an id itself. A collision at the last id has no next candidate and
 * throws FieldRangeError instead.
 */
export function authenticate(id: number, body: Body, secretKey: Uint8Array): AuthenticatedPayload {
  const definition = getMessageDefinition(body.type);
  validateId(id, definition.identified);
  for (const field of definition.fields) {
    if (field.domain.kind === 'identifier' && body.values[field.name] !== id % 2 ** field.width) {
      throw new SchemaMismatchError(`Body of ${body.type} was packed for a different id`, { type: body.type, id });
    }
  }

  const key = resolveAuthKey(definition, secretKey);
  const digest = computeDigest(definition, id, body.bits, key);

  for (const rule of getCollisionRules(body.type)) {
    if (collides(rule, id, body, digest, key)) {
      if (id === MAX_ID) {
        throw new FieldRangeError('id', id, `id space exhausted: ${body.type} collides at the last id ${MAX_ID}`);
      }
      throw new IdCollisionError(body.type, id, id + 1, rule.rival);
    }
  }

  return { type: body.type, id, body, digest };
}

function collides(rule: CollisionRule, id: number, body: Body, digest: BitString, key: Uint8Array): boolean {
  switch (rule.kind) {
    case 'reserved-pattern':
      return Object.entries(rule.values).every(([name, value]) => body.values[name] === value);

    case 'discriminator': {
      // Same body read as the rival type, under the rival's tag
      const rival = computeDigest(getMessageDefinition(rule.rival), id, body.bits, key);
      const width = rule.discriminatorWidth;
      return (
        sliceBits(digest, digest.length - width).value === sliceBits(rival, rival.length - width).value
      );
    }
  }
}
