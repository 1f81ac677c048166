import {
  MessageType,
  PassthroughCommand,
  type FamilyDefinition,
  type FieldSpec,
  type KeycodeFamily,
  type MessageDefinition,
  type PassthroughDefinition,
  type PassthroughFamily,
} from './types.js';

export const FAMILIES: Readonly<Record<KeycodeFamily, FamilyDefinition>> = {
  full: {
    opcodeWidth: 4,
    base: 10,
    alphabet: '0123456789',
    checkInterval: 5,
    checksum: 'damm',
  },
  small: {
    opcodeWidth: 2,
    base: 5,
    alphabet: '12345',
    checkInterval: 7,
    checksum: 'weighted-mod5',
  },
};

export const PASSTHROUGH_FAMILIES: Readonly<
  Record<PassthroughFamily, { readonly opcodeWidth: number; readonly width: number }>
> = {
  'channel-origin': { opcodeWidth: 4, width: 48 },
  'channel-origin-small': { opcodeWidth: 3, width: 13 },
};

/** Full-family credit fields count hours */
export const FULL_UNLOCK_HOURS = 99999;
export const SMALL_UNLOCK_INCREMENT = 255;
export const SMALL_LOCK_INCREMENT = 254;
/** Highest Small set-credit increment; 254 and 255 are the lock and unlock sentinels */
export const SMALL_MAX_SET_CREDIT_INCREMENT = 253;

const FULL_AUTH_WIDTH = 20;
const SMALL_AUTH_WIDTH = 12;

const fullId: FieldSpec = { name: 'id', width: 6, domain: { kind: 'identifier' } };
const smallId: FieldSpec = { name: 'id', width: 6, domain: { kind: 'identifier' } };
const extendedId: FieldSpec = { name: 'id', width: 5, domain: { kind: 'identifier' } };

function fullFactory(type: MessageType, opcode: number): MessageDefinition {
  return {
    type,
    family: 'full',
    opcode,
    fields: [],
    authWidth: FULL_AUTH_WIDTH,
    authTag: opcode,
    identified: false,
    keying: 'zero',
    digits: 8,
  };
}

const SMALL_EXTENDED_GROUP = { group: 'small-extended', discriminatorWidth: 4 } as const;

const MESSAGES: Readonly<Record<MessageType, MessageDefinition>> = {
  [MessageType.FULL_ADD_CREDIT]: {
    type: MessageType.FULL_ADD_CREDIT,
    family: 'full',
    opcode: 0,
    fields: [fullId, { name: 'hours', width: 17, domain: { kind: 'uint', max: FULL_UNLOCK_HOURS } }],
    authWidth: FULL_AUTH_WIDTH,
    authTag: 0,
    identified: true,
    keying: 'device',
    digits: 15,
  },
  [MessageType.FULL_SET_CREDIT]: {
    type: MessageType.FULL_SET_CREDIT,
    family: 'full',
    opcode: 1,
    fields: [fullId, { name: 'hours', width: 17, domain: { kind: 'uint', max: FULL_UNLOCK_HOURS - 1 } }],
    authWidth: FULL_AUTH_WIDTH,
    authTag: 1,
    identified: true,
    keying: 'device',
    digits: 15,
  },
  [MessageType.FULL_UNLOCK]: {
    type: MessageType.FULL_UNLOCK,
    family: 'full',
    opcode: 1,
    fields: [fullId, { name: 'hours', width: 17, domain: { kind: 'constant', value: FULL_UNLOCK_HOURS } }],
    authWidth: FULL_AUTH_WIDTH,
    authTag: 1,
    identified: true,
    keying: 'device',
    digits: 15,
  },
  [MessageType.FULL_WIPE_STATE]: {
    type: MessageType.FULL_WIPE_STATE,
    family: 'full',
    opcode: 2,
    fields: [
      fullId,
      { name: 'reserved', width: 15, domain: { kind: 'constant', value: 0 } },
      {
        name: 'flags',
        width: 2,
        domain: { kind: 'enum', members: { TARGET_FLAGS_0: 0, TARGET_FLAGS_1: 1, WIPE_IDS_ALL: 2 } },
      },
    ],
    authWidth: FULL_AUTH_WIDTH,
    authTag: 2,
    identified: true,
    keying: 'device',
    digits: 15,
  },
  [MessageType.FULL_FACTORY_ALLOW_TEST]: fullFactory(MessageType.FULL_FACTORY_ALLOW_TEST, 4),
  [MessageType.FULL_FACTORY_OQC_TEST]: fullFactory(MessageType.FULL_FACTORY_OQC_TEST, 5),
  [MessageType.FULL_FACTORY_DISPLAY_ID]: fullFactory(MessageType.FULL_FACTORY_DISPLAY_ID, 6),
  [MessageType.FULL_PASSTHROUGH]: {
    type: MessageType.FULL_PASSTHROUGH,
    family: 'full',
    opcode: 8,
    fields: [fullId, { name: 'payload', width: 48, domain: { kind: 'payload', family: 'channel-origin' } }],
    authWidth: FULL_AUTH_WIDTH,
    authTag: 8,
    identified: true,
    keying: 'device',
    digits: 24,
  },

  [MessageType.SMALL_ADD_CREDIT]: {
    type: MessageType.SMALL_ADD_CREDIT,
    family: 'small',
    opcode: 0,
    fields: [smallId, { name: 'increment', width: 8, domain: { kind: 'uint', max: SMALL_UNLOCK_INCREMENT - 1 } }],
    authWidth: SMALL_AUTH_WIDTH,
    authTag: 0,
    identified: true,
    keying: 'device',
    digits: 13,
  },
  [MessageType.SMALL_UNLOCK]: {
    type: MessageType.SMALL_UNLOCK,
    family: 'small',
    opcode: 0,
    fields: [smallId, { name: 'increment', width: 8, domain: { kind: 'constant', value: SMALL_UNLOCK_INCREMENT } }],
    authWidth: SMALL_AUTH_WIDTH,
    authTag: 0,
    identified: true,
    keying: 'device',
    digits: 13,
  },
  [MessageType.SMALL_SET_CREDIT]: {
    type: MessageType.SMALL_SET_CREDIT,
    family: 'small',
    opcode: 2,
    fields: [
      smallId,
      { name: 'increment', width: 8, domain: { kind: 'uint', max: SMALL_MAX_SET_CREDIT_INCREMENT } },
    ],
    authWidth: SMALL_AUTH_WIDTH,
    authTag: 2,
    identified: true,
    keying: 'device',
    digits: 13,
    // Legacy factory test codes occupy this bit pattern
    reserved: [{ rival: MessageType.SMALL_FACTORY_TEST, values: { id: 63, increment: 0 } }],
  },
  [MessageType.SMALL_UPDATE_CREDIT]: {
    type: MessageType.SMALL_UPDATE_CREDIT,
    family: 'small',
    opcode: 2,
    fields: [
      smallId,
      {
        name: 'state',
        width: 8,
        domain: { kind: 'enum', members: { LOCK: SMALL_LOCK_INCREMENT, UNLOCK: SMALL_UNLOCK_INCREMENT } },
      },
    ],
    authWidth: SMALL_AUTH_WIDTH,
    authTag: 2,
    identified: true,
    keying: 'device',
    digits: 13,
  },
  [MessageType.SMALL_MAINTENANCE]: {
    type: MessageType.SMALL_MAINTENANCE,
    family: 'small',
    opcode: 3,
    fields: [
      { name: 'reserved', width: 6, domain: { kind: 'constant', value: 0 } },
      { name: 'category', width: 1, domain: { kind: 'constant', value: 1 } },
      {
        name: 'action',
        width: 7,
        domain: { kind: 'enum', members: { WIPE_STATE_0: 0, WIPE_STATE_1: 1, WIPE_IDS_ALL: 2 } },
      },
    ],
    authWidth: SMALL_AUTH_WIDTH,
    authTag: 3,
    identified: false,
    keying: 'device',
    digits: 13,
  },
  [MessageType.SMALL_FACTORY_TEST]: {
    type: MessageType.SMALL_FACTORY_TEST,
    family: 'small',
    opcode: 3,
    fields: [
      { name: 'reserved', width: 6, domain: { kind: 'constant', value: 0 } },
      { name: 'category', width: 1, domain: { kind: 'constant', value: 0 } },
      { name: 'action', width: 7, domain: { kind: 'enum', members: { SHORT_TEST: 0, OQC_TEST: 1 } } },
    ],
    authWidth: SMALL_AUTH_WIDTH,
    authTag: 3,
    identified: false,
    keying: 'ones',
    digits: 13,
  },
  [MessageType.SMALL_CUSTOM_COMMAND]: {
    type: MessageType.SMALL_CUSTOM_COMMAND,
    family: 'small',
    opcode: 1,
    fields: [
      { name: 'app', width: 1, domain: { kind: 'constant', value: 1 } },
      extendedId,
      { name: 'command', width: 8, domain: { kind: 'enum', members: { WIPE_RESTRICTED_FLAG: 0 } } },
    ],
    authWidth: SMALL_AUTH_WIDTH,
    authTag: 0x10,
    identified: true,
    keying: 'device',
    digits: 13,
    overload: SMALL_EXTENDED_GROUP,
  },
  [MessageType.SMALL_EXTENDED_SET_CREDIT_WIPE_FLAG]: {
    type: MessageType.SMALL_EXTENDED_SET_CREDIT_WIPE_FLAG,
    family: 'small',
    opcode: 1,
    fields: [
      { name: 'app', width: 1, domain: { kind: 'constant', value: 1 } },
      extendedId,
      { name: 'increment', width: 8, domain: { kind: 'uint' } },
    ],
    authWidth: SMALL_AUTH_WIDTH,
    authTag: 0x11,
    identified: true,
    keying: 'device',
    digits: 13,
    overload: SMALL_EXTENDED_GROUP,
  },
  [MessageType.SMALL_PASSTHROUGH]: {
    type: MessageType.SMALL_PASSTHROUGH,
    family: 'small',
    opcode: 1,
    // No transmitted id; the device matches it against its window through the digest
    fields: [
      { name: 'app', width: 1, domain: { kind: 'constant', value: 0 } },
      { name: 'payload', width: 13, domain: { kind: 'payload', family: 'channel-origin-small' } },
    ],
    authWidth: SMALL_AUTH_WIDTH,
    authTag: 1,
    identified: true,
    keying: 'device',
    digits: 13,
  },
};

const controllerAuth: FieldSpec = { name: 'controllerAuth', width: 20, domain: { kind: 'uint', max: 999999 } };
const accessoryDigit: FieldSpec = { name: 'accessoryDigit', width: 4, domain: { kind: 'uint', max: 9 } };

const PASSTHROUGH: Readonly<Record<PassthroughCommand, PassthroughDefinition>> = {
  [PassthroughCommand.UNLINK_ALL_ACCESSORIES]: {
    command: PassthroughCommand.UNLINK_ALL_ACCESSORIES,
    family: 'channel-origin',
    opcode: 0,
    fields: [
      { name: 'action', width: 7, domain: { kind: 'constant', value: 0 } },
      { name: 'reserved', width: 17, domain: { kind: 'constant', value: 0 } },
      controllerAuth,
    ],
  },
  [PassthroughCommand.UNLOCK_ALL_ACCESSORIES]: {
    command: PassthroughCommand.UNLOCK_ALL_ACCESSORIES,
    family: 'channel-origin',
    opcode: 0,
    fields: [
      { name: 'action', width: 7, domain: { kind: 'constant', value: 1 } },
      { name: 'reserved', width: 17, domain: { kind: 'constant', value: 0 } },
      controllerAuth,
    ],
  },
  [PassthroughCommand.UNLOCK_ACCESSORY]: {
    command: PassthroughCommand.UNLOCK_ACCESSORY,
    family: 'channel-origin',
    opcode: 1,
    fields: [accessoryDigit, { name: 'reserved', width: 20, domain: { kind: 'constant', value: 0 } }, controllerAuth],
  },
  [PassthroughCommand.UNLINK_ACCESSORY]: {
    command: PassthroughCommand.UNLINK_ACCESSORY,
    family: 'channel-origin',
    opcode: 2,
    fields: [accessoryDigit, { name: 'reserved', width: 20, domain: { kind: 'constant', value: 0 } }, controllerAuth],
  },
  [PassthroughCommand.LINK_ACCESSORY_MODE_3]: {
    command: PassthroughCommand.LINK_ACCESSORY_MODE_3,
    family: 'channel-origin',
    opcode: 9,
    fields: [
      accessoryDigit,
      { name: 'challengeResult', width: 20, domain: { kind: 'uint', max: 999999 } },
      controllerAuth,
    ],
  },
  [PassthroughCommand.SMALL_UNLINK_ALL_ACCESSORIES]: {
    command: PassthroughCommand.SMALL_UNLINK_ALL_ACCESSORIES,
    family: 'channel-origin-small',
    opcode: 0,
    fields: [
      { name: 'action', width: 2, domain: { kind: 'constant', value: 0 } },
      { name: 'data', width: 8, domain: { kind: 'constant', value: 0 } },
    ],
  },
  [PassthroughCommand.SMALL_UNLOCK_ALL_ACCESSORIES]: {
    command: PassthroughCommand.SMALL_UNLOCK_ALL_ACCESSORIES,
    family: 'channel-origin-small',
    opcode: 0,
    fields: [
      { name: 'action', width: 2, domain: { kind: 'constant', value: 1 } },
      { name: 'data', width: 8, domain: { kind: 'constant', value: 0 } },
    ],
  },
  [PassthroughCommand.SMALL_SET_CREDIT_WIPE_RESTRICTED_FLAG]: {
    command: PassthroughCommand.SMALL_SET_CREDIT_WIPE_RESTRICTED_FLAG,
    family: 'channel-origin-small',
    opcode: 0,
    fields: [
      { name: 'action', width: 2, domain: { kind: 'constant', value: 3 } },
      { name: 'increment', width: 8, domain: { kind: 'uint' } },
    ],
  },
};

export function getMessageDefinition(type: MessageType): MessageDefinition {
  return MESSAGES[type];
}

export function getPassthroughDefinition(command: PassthroughCommand): PassthroughDefinition {
  return PASSTHROUGH[command];
}

export function listMessageDefinitions(): MessageDefinition[] {
  return Object.values(MESSAGES);
}

export function listPassthroughDefinitions(): PassthroughDefinition[] {
  return Object.values(PASSTHROUGH);
}

/**
 * Total body width in bits, opcode included.
 */
export function bodyWidth(definition: MessageDefinition): number {
  return FAMILIES[definition.family].opcodeWidth + fieldsWidth(definition.fields);
}

export function passthroughWidth(definition: PassthroughDefinition): number {
  return PASSTHROUGH_FAMILIES[definition.family].opcodeWidth + fieldsWidth(definition.fields);
}

function fieldsWidth(fields: readonly FieldSpec[]): number {
  return fields.reduce((acc, field) => acc + field.width, 0);
}
