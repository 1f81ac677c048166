import type { PassthroughBody } from './codec/body.js';
import { addCreditIncrement, setCreditIncrement } from './protocol/credit.js';
import { SMALL_LOCK_INCREMENT, SMALL_UNLOCK_INCREMENT } from './protocol/registry.js';
import { MessageType } from './protocol/types.js';
import type { KeycodeMessage } from './types.js';

export type FullWipeFlags = 'TARGET_FLAGS_0' | 'TARGET_FLAGS_1' | 'WIPE_IDS_ALL';
export type FullFactoryTest = 'ALLOW_TEST' | 'OQC_TEST' | 'DISPLAY_ID';
export type SmallMaintenanceAction = 'WIPE_STATE_0' | 'WIPE_STATE_1' | 'WIPE_IDS_ALL';
export type SmallFactoryAction = 'SHORT_TEST' | 'OQC_TEST';

const NO_KEY = new Uint8Array(0);

const FULL_FACTORY_TYPES: Readonly<Record<FullFactoryTest, MessageType>> = {
  ALLOW_TEST: MessageType.FULL_FACTORY_ALLOW_TEST,
  OQC_TEST: MessageType.FULL_FACTORY_OQC_TEST,
  DISPLAY_ID: MessageType.FULL_FACTORY_DISPLAY_ID,
};

// Full keypad

export function fullAddCredit(id: number, hours: number, secretKey: Uint8Array): KeycodeMessage {
  return { type: MessageType.FULL_ADD_CREDIT, fields: { hours }, id, secretKey };
}

export function fullSetCredit(id: number, hours: number, secretKey: Uint8Array): KeycodeMessage {
  return { type: MessageType.FULL_SET_CREDIT, fields: { hours }, id, secretKey };
}

export function fullUnlock(id: number, secretKey: Uint8Array): KeycodeMessage {
  return { type: MessageType.FULL_UNLOCK, fields: {}, id, secretKey };
}

export function fullWipeState(id: number, flags: FullWipeFlags, secretKey: Uint8Array): KeycodeMessage {
  return { type: MessageType.FULL_WIPE_STATE, fields: { flags }, id, secretKey };
}

/**
 * Factory tests are keyed with a fixed public key and carry no id.
 */
export function fullFactoryTest(test: FullFactoryTest): KeycodeMessage {
  return { type: FULL_FACTORY_TYPES[test], fields: {}, id: 0, secretKey: NO_KEY };
}

export function fullPassthrough(id: number, payload: PassthroughBody, secretKey: Uint8Array): KeycodeMessage {
  return { type: MessageType.FULL_PASSTHROUGH, fields: { payload }, id, secretKey };
}

// Small keypad

/**
 * Add `days` of credit, rounded down to the nearest representable increment.
 */
export function smallAddCredit(id: number, days: number | 'unlock', secretKey: Uint8Array): KeycodeMessage {
  const increment = addCreditIncrement(days);
  if (increment === SMALL_UNLOCK_INCREMENT) {
    return { type: MessageType.SMALL_UNLOCK, fields: {}, id, secretKey };
  }
  return { type: MessageType.SMALL_ADD_CREDIT, fields: { increment }, id, secretKey };
}

/**
 * Replace remaining credit with `days`. Zero days locks the device and
 * 'unlock' unlocks it permanently.
 */
export function smallSetCredit(id: number, days: number | 'unlock', secretKey: Uint8Array): KeycodeMessage {
  const increment = setCreditIncrement(days);
  if (increment === SMALL_LOCK_INCREMENT) {
    return { type: MessageType.SMALL_UPDATE_CREDIT, fields: { state: 'LOCK' }, id, secretKey };
  }
  if (increment === SMALL_UNLOCK_INCREMENT) {
    return { type: MessageType.SMALL_UPDATE_CREDIT, fields: { state: 'UNLOCK' }, id, secretKey };
  }
  return { type: MessageType.SMALL_SET_CREDIT, fields: { increment }, id, secretKey };
}

export function smallMaintenance(action: SmallMaintenanceAction, secretKey: Uint8Array): KeycodeMessage {
  return { type: MessageType.SMALL_MAINTENANCE, fields: { action }, id: 0, secretKey };
}

export function smallFactoryTest(action: SmallFactoryAction): KeycodeMessage {
  return { type: MessageType.SMALL_FACTORY_TEST, fields: { action }, id: 0, secretKey: NO_KEY };
}

export function smallWipeRestrictedFlag(id: number, secretKey: Uint8Array): KeycodeMessage {
  return {
    type: MessageType.SMALL_CUSTOM_COMMAND,
    fields: { command: 'WIPE_RESTRICTED_FLAG' },
    id,
    secretKey,
  };
}

/**
 * Set credit to `days` and clear the restricted flag in one code. Days go
 * through the set-credit table, so 0 locks and 'unlock' unlocks.
 */
export function smallSetCreditWipeFlag(
  id: number,
  days: number | 'unlock',
  secretKey: Uint8Array
): KeycodeMessage {
  const increment = setCreditIncrement(days);
  return { type: MessageType.SMALL_EXTENDED_SET_CREDIT_WIPE_FLAG, fields: { increment }, id, secretKey };
}

export function smallPassthrough(id: number, payload: PassthroughBody, secretKey: Uint8Array): KeycodeMessage {
  return { type: MessageType.SMALL_PASSTHROUGH, fields: { payload }, id, secretKey };
}
