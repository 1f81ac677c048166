export {
  MessageType,
  PassthroughCommand,
  type KeycodeFamily,
  type PassthroughFamily,
  type FieldDomain,
  type FieldSpec,
  type BodyLayout,
  type Keying,
  type ReservedPattern,
  type DigestOverload,
  type MessageDefinition,
  type PassthroughDefinition,
  type FamilyDefinition,
} from './types.js';

export {
  FAMILIES,
  PASSTHROUGH_FAMILIES,
  FULL_UNLOCK_HOURS,
  SMALL_UNLOCK_INCREMENT,
  SMALL_LOCK_INCREMENT,
  SMALL_MAX_SET_CREDIT_INCREMENT,
  getMessageDefinition,
  getPassthroughDefinition,
  listMessageDefinitions,
  listPassthroughDefinitions,
  bodyWidth,
  passthroughWidth,
} from './registry.js';

export { deriveCollisionRules, getCollisionRules, type CollisionRule } from './collisions.js';

export {
  addCreditIncrement,
  setCreditIncrement,
  MAX_ADD_CREDIT_DAYS,
  MAX_SET_CREDIT_DAYS,
} from './credit.js';
