// Pipeline
export { encodeKeycode } from './encoder.js';
export { KeycodeGenerator } from './client.js';

// Types
export type { KeycodeMessage, EncodeOptions, GeneratedKeycode } from './types.js';

// Config
export {
  GeneratorConfigSchema,
  parseGeneratorConfig,
  loadConfigFromEnv,
  type GeneratorConfig,
  type GeneratorConfigInput,
} from './config.js';

// Errors
export {
  KeycodeError,
  FieldRangeError,
  SchemaMismatchError,
  IdCollisionError,
  EncodingOverflowError,
  SecretKeyError,
  ConfigError,
  type KeycodeErrorCode,
} from './errors.js';

// Message builders
export {
  fullAddCredit,
  fullSetCredit,
  fullUnlock,
  fullWipeState,
  fullFactoryTest,
  fullPassthrough,
  smallAddCredit,
  smallSetCredit,
  smallMaintenance,
  smallFactoryTest,
  smallWipeRestrictedFlag,
  smallSetCreditWipeFlag,
  smallPassthrough,
  type FullWipeFlags,
  type FullFactoryTest,
  type SmallMaintenanceAction,
  type SmallFactoryAction,
} from './messages.js';

// Protocol registry
export {
  MessageType,
  PassthroughCommand,
  getMessageDefinition,
  getPassthroughDefinition,
  listMessageDefinitions,
  addCreditIncrement,
  setCreditIncrement,
  type KeycodeFamily,
  type PassthroughFamily,
  type FieldSpec,
  type MessageDefinition,
  type PassthroughDefinition,
} from './protocol/index.js';

// Stages
export {
  encodeBody,
  encodePassthroughBody,
  formatKeycode,
  hasValidCheckDigits,
  type Body,
  type PassthroughBody,
  type FieldValues,
  type FormatOptions,
} from './codec/index.js';
export { authenticate, bytesToHex, hexToBytes, type AuthenticatedPayload } from './crypto/index.js';

// Accessory passthrough
export {
  unlinkAllAccessories,
  unlockAllAccessories,
  unlockAccessory,
  unlinkAccessory,
  linkAccessoryMode3,
  smallUnlinkAllAccessories,
  smallUnlockAllAccessories,
  smallSetCreditWipeRestrictedFlag,
  type ControllerCredentials,
  type AccessoryTarget,
  type LinkAccessoryOptions,
} from './passthrough/index.js';
