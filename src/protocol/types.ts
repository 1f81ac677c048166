/**
 * Keycode message types across both keypad families.
 */
export enum MessageType {
  FULL_ADD_CREDIT = 'FULL_ADD_CREDIT',
  FULL_SET_CREDIT = 'FULL_SET_CREDIT',
  FULL_UNLOCK = 'FULL_UNLOCK',
  FULL_WIPE_STATE = 'FULL_WIPE_STATE',
  FULL_FACTORY_ALLOW_TEST = 'FULL_FACTORY_ALLOW_TEST',
  FULL_FACTORY_OQC_TEST = 'FULL_FACTORY_OQC_TEST',
  FULL_FACTORY_DISPLAY_ID = 'FULL_FACTORY_DISPLAY_ID',
  FULL_PASSTHROUGH = 'FULL_PASSTHROUGH',
  SMALL_ADD_CREDIT = 'SMALL_ADD_CREDIT',
  SMALL_UNLOCK = 'SMALL_UNLOCK',
  SMALL_SET_CREDIT = 'SMALL_SET_CREDIT',
  SMALL_UPDATE_CREDIT = 'SMALL_UPDATE_CREDIT',
  SMALL_MAINTENANCE = 'SMALL_MAINTENANCE',
  SMALL_FACTORY_TEST = 'SMALL_FACTORY_TEST',
  SMALL_CUSTOM_COMMAND = 'SMALL_CUSTOM_COMMAND',
  SMALL_EXTENDED_SET_CREDIT_WIPE_FLAG = 'SMALL_EXTENDED_SET_CREDIT_WIPE_FLAG',
  SMALL_PASSTHROUGH = 'SMALL_PASSTHROUGH',
}

/**
 * Nested accessory commands carried inside passthrough messages.
 */
export enum PassthroughCommand {
  UNLINK_ALL_ACCESSORIES = 'UNLINK_ALL_ACCESSORIES',
  UNLOCK_ALL_ACCESSORIES = 'UNLOCK_ALL_ACCESSORIES',
  UNLOCK_ACCESSORY = 'UNLOCK_ACCESSORY',
  UNLINK_ACCESSORY = 'UNLINK_ACCESSORY',
  LINK_ACCESSORY_MODE_3 = 'LINK_ACCESSORY_MODE_3',
  SMALL_UNLINK_ALL_ACCESSORIES = 'SMALL_UNLINK_ALL_ACCESSORIES',
  SMALL_UNLOCK_ALL_ACCESSORIES = 'SMALL_UNLOCK_ALL_ACCESSORIES',
  SMALL_SET_CREDIT_WIPE_RESTRICTED_FLAG = 'SMALL_SET_CREDIT_WIPE_RESTRICTED_FLAG',
}

export type KeycodeFamily = 'full' | 'small';

export type PassthroughFamily = 'channel-origin' | 'channel-origin-small';

export type FieldDomain =
  | { kind: 'uint'; max?: number }
  | { kind: 'enum'; members: Readonly<Record<string, number>> }
  | { kind: 'constant'; value: number }
  | { kind: 'identifier' }
  | { kind: 'payload'; family: PassthroughFamily };

export interface FieldSpec {
  readonly name: string;
  /** Width in bits, fixed per type */
  readonly width: number;
  readonly domain: FieldDomain;
}

/**
 * Opcode plus ordered fields: everything needed to pack a body.
 */
export interface BodyLayout {
  readonly opcode: number;
  readonly fields: readonly FieldSpec[];
}

/**
 * Which SipHash key authenticates a message.
 * `device` uses the caller's secret; the others are fixed public keys.
 */
export type Keying = 'device' | 'zero' | 'ones';

/**
 * Field values that, when all present in a body, are owned by another
 * message interpretation.
 */
export interface ReservedPattern {
  readonly rival: MessageType;
  readonly values: Readonly<Record<string, number>>;
}

/**
 * Types in the same overload group share a bit layout. The decoder tells
 * them apart by the low `discriminatorWidth` bits of the digest.
 */
export interface DigestOverload {
  readonly group: string;
  readonly discriminatorWidth: number;
}

export interface MessageDefinition extends BodyLayout {
  readonly type: MessageType;
  readonly family: KeycodeFamily;
  /** Digest width in bits */
  readonly authWidth: number;
  /** Byte mixed into the digest input, separates types sharing an opcode */
  readonly authTag: number;
  /** Whether the message id is bound into the digest */
  readonly identified: boolean;
  readonly keying: Keying;
  /** Data digits before check digits are inserted */
  readonly digits: number;
  readonly reserved?: readonly ReservedPattern[];
  readonly overload?: DigestOverload;
}

export interface PassthroughDefinition extends BodyLayout {
  readonly command: PassthroughCommand;
  readonly family: PassthroughFamily;
}

export interface FamilyDefinition {
  readonly opcodeWidth: number;
  readonly base: number;
  readonly alphabet: string;
  readonly checkInterval: number;
  readonly checksum: 'damm' | 'weighted-mod5';
}
