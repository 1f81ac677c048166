export { siphash24, siphashDigits, SIPHASH_KEY_SIZE } from './siphash.js';

export {
  bytesToHex,
  hexToBytes,
  concatBytes,
  uintLE,
  pseudorandomBits,
  ZERO_KEY,
  ONES_KEY,
} from './utils.js';

export {
  authenticate,
  computeDigest,
  resolveAuthKey,
  type AuthenticatedPayload,
} from './auth.js';
