import { describe, it, expect, expectTypeOf } from 'vitest';
import {
  encodeKeycode,
  fullAddCredit,
  fullUnlock,
  fullWipeState,
  fullFactoryTest,
  smallAddCredit,
  smallSetCredit,
  smallMaintenance,
  smallFactoryTest,
  smallWipeRestrictedFlag,
  smallSetCreditWipeFlag,
  hexToBytes,
  MessageType,
  IdCollisionError,
  SecretKeyError,
  hasValidCheckDigits,
  type KeycodeMessage,
} from '../src/index.js';

const TEST_KEY = hexToBytes('00112233445566778899aabbccddeeff');

const FULL_18 = /^\*(\d{3} ){5}\d{3}#$/;
const SMALL_15 = /^[1-5]{15}$/;

describe('encodeKeycode', () => {
  it('should produce the same unlock code on repeated runs', () => {
    const first = encodeKeycode(fullUnlock(44, TEST_KEY));
    expect(first).toBe('*014 945 826 453 529 659#');
    expect(encodeKeycode(fullUnlock(44, TEST_KEY))).toBe(first);
  });

  it('should produce different codes for different ids', () => {
    expect(encodeKeycode(fullUnlock(45, TEST_KEY))).toBe('*015 089 570 353 089 642#');
  });

  it('should keep Full codes at a fixed length and alphabet', () => {
    for (let id = 0; id < 100; id++) {
      const keycode = encodeKeycode(fullAddCredit(id, id * 997, TEST_KEY));
      expect(keycode).toMatch(FULL_18);
      expect(hasValidCheckDigits(keycode, 'full')).toBe(true);
    }
  });

  it('should keep Small codes at a fixed length and alphabet', () => {
    for (let id = 0; id < 100; id++) {
      const keycode = encodeKeycode(smallAddCredit(id, (id % 400) + 1, TEST_KEY));
      expect(keycode).toMatch(SMALL_15);
      expect(hasValidCheckDigits(keycode, 'small')).toBe(true);
    }
  });

  it('should encode every remaining Full type', () => {
    expect(encodeKeycode(fullWipeState(3, 'WIPE_IDS_ALL', TEST_KEY))).toMatch(FULL_18);
    expect(encodeKeycode(fullFactoryTest('ALLOW_TEST'))).toBe('*047 457 066 2#');
    expect(encodeKeycode(fullFactoryTest('DISPLAY_ID'))).toMatch(/^\*(\d{3} ){3}\d#$/);
  });

  it('should encode every remaining Small type', () => {
    expect(encodeKeycode(smallFactoryTest('SHORT_TEST'))).toBe('151413151155544');
    expect(encodeKeycode(smallMaintenance('WIPE_STATE_0', TEST_KEY))).toMatch(SMALL_15);
    expect(encodeKeycode(smallSetCreditWipeFlag(4, 111, TEST_KEY))).toMatch(SMALL_15);
  });

  it('should refuse an extended code whose id collides, then accept id + 1', () => {
    try {
      encodeKeycode(smallWipeRestrictedFlag(20, TEST_KEY));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(IdCollisionError);
      if (error instanceof IdCollisionError) expect(error.nextId).toBe(21);
    }
    expect(encodeKeycode(smallWipeRestrictedFlag(21, TEST_KEY))).toBe('133351215513453');
  });

  it('should refuse the legacy test pattern and accept the next id', () => {
    expect(() => encodeKeycode(smallSetCredit(63, 1, TEST_KEY))).toThrow(IdCollisionError);
    expect(encodeKeycode(smallSetCredit(64, 1, TEST_KEY))).toBe('134443555513144');
  });

  it('should fail without a usable device key', () => {
    expect(() => encodeKeycode(fullUnlock(1, new Uint8Array(8)))).toThrow(SecretKeyError);
  });

  it('should obscure on request', () => {
    expect(encodeKeycode(fullAddCredit(5, 24, TEST_KEY), { obscure: true })).toBe('*014 605 679 721 598 659#');
  });
});

describe('message builders', () => {
  it('should convert Small set-credit days to an increment', () => {
    const message = smallSetCredit(30, 30, TEST_KEY);
    expect(message.type).toBe(MessageType.SMALL_SET_CREDIT);
    expect(message.fields).toEqual({ increment: 29 });
    expect(encodeKeycode(message)).toBe('142553145414211');
  });

  it('should lock with zero days and unlock on request', () => {
    const lock = smallSetCredit(12, 0, TEST_KEY);
    expect(lock.type).toBe(MessageType.SMALL_UPDATE_CREDIT);
    expect(lock.fields).toEqual({ state: 'LOCK' });
    expect(encodeKeycode(lock)).toBe('141143351311524');

    expect(smallSetCredit(12, 'unlock', TEST_KEY).fields).toEqual({ state: 'UNLOCK' });
    expect(smallAddCredit(12, 'unlock', TEST_KEY).type).toBe(MessageType.SMALL_UNLOCK);
  });

  it('should convert days for the set-credit and wipe-flag code', () => {
    expect(smallSetCreditWipeFlag(4, 1, TEST_KEY).fields).toEqual({ increment: 0 });
    expect(smallSetCreditWipeFlag(4, 1000, TEST_KEY).fields).toEqual({ increment: 242 });
    expect(smallSetCreditWipeFlag(4, 'unlock', TEST_KEY).fields).toEqual({ increment: 255 });
  });

  it('should expose messages as read-only', () => {
    type Writable<T> = { -readonly [K in keyof T]: T[K] };
    expectTypeOf<KeycodeMessage>().not.toEqualTypeOf<Writable<KeycodeMessage>>();
    expectTypeOf(fullUnlock(44, TEST_KEY)).toEqualTypeOf<KeycodeMessage>();
  });

  it('should build keyless factory messages', () => {
    const message = fullFactoryTest('OQC_TEST');
    expect(message.type).toBe(MessageType.FULL_FACTORY_OQC_TEST);
    expect(message.id).toBe(0);
    expect(message.secretKey.length).toBe(0);
  });
});
