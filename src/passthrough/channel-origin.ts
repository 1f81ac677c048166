import { FieldRangeError, SecretKeyError } from '../errors.js';
import { encodePassthroughBody, type PassthroughBody } from '../codec/body.js';
import { siphashDigits, SIPHASH_KEY_SIZE } from '../crypto/siphash.js';
import { concatBytes, uintLE } from '../crypto/utils.js';
import { setCreditIncrement } from '../protocol/credit.js';
import { PassthroughCommand } from '../protocol/types.js';

/** Accessory ids: 16-bit authority id above a 32-bit device id */
export const MAX_ACCESSORY_ID = 2 ** 48 - 1;

const MAX_COUNT = 0xffffffff;

/** Nested opcode of the mode 3 link command, mixed into its controller auth */
const LINK_MODE_3_OPCODE = 9;

export interface ControllerCredentials {
  /** Controller's channel-origin command counter */
  controllerCount: number;
  /** 16-byte controller key */
  controllerKey: Uint8Array;
}

export interface AccessoryTarget extends ControllerCredentials {
  /** 48-bit accessory id */
  accessoryId: number;
}

export interface LinkAccessoryOptions extends AccessoryTarget {
  /** Accessory's own channel counter */
  accessoryCount: number;
  /** 16-byte accessory key */
  accessoryKey: Uint8Array;
}

function requireKey(key: Uint8Array, name: string): Uint8Array {
  if (key.length !== SIPHASH_KEY_SIZE) {
    throw new SecretKeyError(`${name} must be ${SIPHASH_KEY_SIZE} bytes`, key.length);
  }
  return key;
}

function requireCount(count: number, name: string): number {
  if (!Number.isInteger(count) || count < 0 || count > MAX_COUNT) {
    throw new FieldRangeError(name, count, `${name} must be an integer in 0..${MAX_COUNT}`);
  }
  return count;
}

function splitAccessoryId(accessoryId: number): { authorityId: number; deviceId: number } {
  if (!Number.isInteger(accessoryId) || accessoryId < 0 || accessoryId > MAX_ACCESSORY_ID) {
    throw new FieldRangeError('accessoryId', accessoryId, 'accessoryId must be a 48-bit unsigned integer');
  }
  return {
    authorityId: Math.floor(accessoryId / 2 ** 32),
    deviceId: accessoryId % 2 ** 32,
  };
}

/**
 * Last decimal digit of the accessory's device id, as shown on its label.
 */
export function accessoryIdDigit(accessoryId: number): number {
  return splitAccessoryId(accessoryId).deviceId % 10;
}

function genericActionAuth(credentials: ControllerCredentials, action: number, data: number): number {
  const key = requireKey(credentials.controllerKey, 'controllerKey');
  const count = requireCount(credentials.controllerCount, 'controllerCount');
  return siphashDigits(key, concatBytes(uintLE(count, 4), uintLE(0, 1), uintLE(action, 2), uintLE(data, 2)));
}

function accessoryActionAuth(target: AccessoryTarget, typeCode: number): number {
  const key = requireKey(target.controllerKey, 'controllerKey');
  const count = requireCount(target.controllerCount, 'controllerCount');
  const { authorityId, deviceId } = splitAccessoryId(target.accessoryId);
  return siphashDigits(
    key,
    concatBytes(uintLE(count, 4), uintLE(typeCode, 1), uintLE(authorityId, 2), uintLE(deviceId, 4))
  );
}

export function unlinkAllAccessories(credentials: ControllerCredentials): PassthroughBody {
  return encodePassthroughBody(PassthroughCommand.UNLINK_ALL_ACCESSORIES, {
    controllerAuth: genericActionAuth(credentials, 0, 0),
  });
}

export function unlockAllAccessories(credentials: ControllerCredentials): PassthroughBody {
  return encodePassthroughBody(PassthroughCommand.UNLOCK_ALL_ACCESSORIES, {
    controllerAuth: genericActionAuth(credentials, 1, 0),
  });
}

export function unlockAccessory(target: AccessoryTarget): PassthroughBody {
  return encodePassthroughBody(PassthroughCommand.UNLOCK_ACCESSORY, {
    accessoryDigit: accessoryIdDigit(target.accessoryId),
    controllerAuth: accessoryActionAuth(target, 1),
  });
}

export function unlinkAccessory(target: AccessoryTarget): PassthroughBody {
  return encodePassthroughBody(PassthroughCommand.UNLINK_ACCESSORY, {
    accessoryDigit: accessoryIdDigit(target.accessoryId),
    controllerAuth: accessoryActionAuth(target, 2),
  });
}

/**
 * Six-digit challenge result the accessory expects for its current count.
 */
export function accessoryChallengeResult(accessoryKey: Uint8Array, accessoryCount: number): number {
  const key = requireKey(accessoryKey, 'accessoryKey');
  return siphashDigits(key, uintLE(requireCount(accessoryCount, 'accessoryCount'), 4));
}

/**
 * Link an accessory using the challenge-result handshake (mode 3).
 * The controller auth covers the accessory digit and the challenge result.
 */
export function linkAccessoryMode3(options: LinkAccessoryOptions): PassthroughBody {
  const digit = accessoryIdDigit(options.accessoryId);
  const challengeResult = accessoryChallengeResult(options.accessoryKey, options.accessoryCount);

  const key = requireKey(options.controllerKey, 'controllerKey');
  const count = requireCount(options.controllerCount, 'controllerCount');
  const controllerAuth = siphashDigits(
    key,
    concatBytes(uintLE(count, 4), uintLE(LINK_MODE_3_OPCODE, 1), uintLE(digit, 1), uintLE(challengeResult, 4))
  );

  return encodePassthroughBody(PassthroughCommand.LINK_ACCESSORY_MODE_3, {
    accessoryDigit: digit,
    challengeResult,
    controllerAuth,
  });
}

// Small-keypad variants carry no nested auth: the host digest covers them.

export function smallUnlinkAllAccessories(): PassthroughBody {
  return encodePassthroughBody(PassthroughCommand.SMALL_UNLINK_ALL_ACCESSORIES, {});
}

export function smallUnlockAllAccessories(): PassthroughBody {
  return encodePassthroughBody(PassthroughCommand.SMALL_UNLOCK_ALL_ACCESSORIES, {});
}

export function smallSetCreditWipeRestrictedFlag(days: number | 'unlock'): PassthroughBody {
  const increment = setCreditIncrement(days);
  return encodePassthroughBody(PassthroughCommand.SMALL_SET_CREDIT_WIPE_RESTRICTED_FLAG, { increment });
}
