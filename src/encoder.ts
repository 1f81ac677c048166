import { encodeBody } from './codec/body.js';
import { formatKeycode } from './codec/keycode.js';
import { authenticate } from './crypto/auth.js';
import { getMessageDefinition } from './protocol/registry.js';
import type { EncodeOptions, KeycodeMessage } from './types.js';

/**
 * Encode a message into a keycode: pack the body, authenticate it under
 * the message id, then render it for the type's keypad family.
 *
 * Throws IdCollisionError when `message.id` cannot be used for this
 * command; see KeycodeGenerator for a retrying caller.
 */
export function encodeKeycode(message: KeycodeMessage, options: EncodeOptions = {}): string {
  const { family } = getMessageDefinition(message.type);
  const body = encodeBody(message.type, message.fields, message.id);
  const payload = authenticate(message.id, body, message.secretKey);
  return formatKeycode(payload, family, options);
}
