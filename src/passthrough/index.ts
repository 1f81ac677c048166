export {
  MAX_ACCESSORY_ID,
  accessoryIdDigit,
  accessoryChallengeResult,
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
} from './channel-origin.js';
