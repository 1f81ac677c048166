import { describe, it, expect } from 'vitest';
import { encodeBody, encodePassthroughBody, bitsToString, MAX_ID } from '../src/codec/index.js';
import { MessageType, PassthroughCommand } from '../src/protocol/index.js';
import { FieldRangeError, SchemaMismatchError } from '../src/errors.js';

describe('Field Encoder', () => {
  describe('encodeBody', () => {
    it('should pack opcode, id bits and fields in registry order', () => {
      const body = encodeBody(MessageType.FULL_ADD_CREDIT, { hours: 24 }, 5);
      expect(bitsToString(body.bits)).toBe('0000' + '000101' + '00000000000011000');
      expect(body.values).toEqual({ id: 5, hours: 24 });
    });

    it('should keep only the low identifier bits in the body', () => {
      const body = encodeBody(MessageType.FULL_ADD_CREDIT, { hours: 1 }, 70);
      expect(bitsToString(body.bits).slice(4, 10)).toBe('000110');
      expect(body.values.id).toBe(6);
    });

    it('should write constant fields', () => {
      const body = encodeBody(MessageType.FULL_UNLOCK, {}, 44);
      expect(bitsToString(body.bits)).toBe('000110110011000011010011111');
      expect(body.values.hours).toBe(99999);
    });

    it('should map enum members to their codes', () => {
      const wipe = encodeBody(MessageType.FULL_WIPE_STATE, { flags: 'WIPE_IDS_ALL' }, 1);
      expect(bitsToString(wipe.bits)).toBe('0010' + '000001' + '0'.repeat(15) + '10');

      const maintenance = encodeBody(MessageType.SMALL_MAINTENANCE, { action: 'WIPE_IDS_ALL' });
      expect(bitsToString(maintenance.bits)).toBe('11' + '000000' + '1' + '0000010');
    });

    it('should be deterministic', () => {
      const a = encodeBody(MessageType.SMALL_ADD_CREDIT, { increment: 6 }, 3);
      const b = encodeBody(MessageType.SMALL_ADD_CREDIT, { increment: 6 }, 3);
      expect(a).toEqual(b);
      expect(bitsToString(a.bits)).toBe('0000001100000110');
    });

    it('should accept a field at its maximum and reject one past it', () => {
      expect(() => encodeBody(MessageType.FULL_ADD_CREDIT, { hours: 99999 }, 1)).not.toThrow();
      expect(() => encodeBody(MessageType.FULL_ADD_CREDIT, { hours: 100000 }, 1)).toThrow(FieldRangeError);

      expect(() => encodeBody(MessageType.FULL_SET_CREDIT, { hours: 99998 }, 1)).not.toThrow();
      expect(() => encodeBody(MessageType.FULL_SET_CREDIT, { hours: 99999 }, 1)).toThrow(FieldRangeError);

      expect(() => encodeBody(MessageType.SMALL_ADD_CREDIT, { increment: 254 }, 1)).not.toThrow();
      expect(() => encodeBody(MessageType.SMALL_ADD_CREDIT, { increment: 255 }, 1)).toThrow(FieldRangeError);

      expect(() => encodeBody(MessageType.SMALL_SET_CREDIT, { increment: 253 }, 1)).not.toThrow();
      expect(() => encodeBody(MessageType.SMALL_SET_CREDIT, { increment: 254 }, 1)).toThrow(FieldRangeError);

      expect(() => encodeBody(MessageType.SMALL_EXTENDED_SET_CREDIT_WIPE_FLAG, { increment: 255 }, 1)).not.toThrow();
      expect(() => encodeBody(MessageType.SMALL_EXTENDED_SET_CREDIT_WIPE_FLAG, { increment: 256 }, 1)).toThrow(
        FieldRangeError
      );
    });

    it('should name the offending field', () => {
      try {
        encodeBody(MessageType.FULL_ADD_CREDIT, { hours: -1 }, 1);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(FieldRangeError);
        if (error instanceof FieldRangeError) {
          expect(error.field).toBe('hours');
          expect(error.value).toBe(-1);
        }
      }
    });

    it('should reject fractional values and unknown enum members', () => {
      expect(() => encodeBody(MessageType.FULL_ADD_CREDIT, { hours: 1.5 }, 1)).toThrow(FieldRangeError);
      expect(() => encodeBody(MessageType.FULL_WIPE_STATE, { flags: 'WIPE_EVERYTHING' }, 1)).toThrow(FieldRangeError);
    });

    it('should reject missing and unexpected fields', () => {
      expect(() => encodeBody(MessageType.FULL_ADD_CREDIT, {}, 1)).toThrow(SchemaMismatchError);
      expect(() => encodeBody(MessageType.FULL_ADD_CREDIT, { hours: 1, days: 1 }, 1)).toThrow(SchemaMismatchError);
    });

    it('should reject values for constant and identifier fields', () => {
      expect(() => encodeBody(MessageType.FULL_UNLOCK, { hours: 99999 }, 1)).toThrow(SchemaMismatchError);
      expect(() => encodeBody(MessageType.FULL_ADD_CREDIT, { hours: 1, id: 1 }, 1)).toThrow(SchemaMismatchError);
    });

    it('should reject values of the wrong kind', () => {
      expect(() => encodeBody(MessageType.FULL_ADD_CREDIT, { hours: '24' }, 1)).toThrow(SchemaMismatchError);
      expect(() => encodeBody(MessageType.FULL_WIPE_STATE, { flags: 2 }, 1)).toThrow(SchemaMismatchError);
    });

    it('should validate the id range', () => {
      expect(() => encodeBody(MessageType.FULL_UNLOCK, {}, MAX_ID)).not.toThrow();
      expect(() => encodeBody(MessageType.FULL_UNLOCK, {}, MAX_ID + 1)).toThrow(FieldRangeError);
      expect(() => encodeBody(MessageType.FULL_UNLOCK, {}, -1)).toThrow(FieldRangeError);
    });

    it('should require id 0 for types without identifier', () => {
      expect(() => encodeBody(MessageType.FULL_FACTORY_OQC_TEST, {}, 0)).not.toThrow();
      expect(() => encodeBody(MessageType.FULL_FACTORY_OQC_TEST, {}, 1)).toThrow(FieldRangeError);
      expect(() => encodeBody(MessageType.SMALL_MAINTENANCE, { action: 'WIPE_STATE_0' }, 3)).toThrow(FieldRangeError);
    });
  });

  describe('payload fields', () => {
    it('should embed a nested body verbatim', () => {
      const nested = encodePassthroughBody(PassthroughCommand.SMALL_UNLOCK_ALL_ACCESSORIES, {});
      expect(bitsToString(nested.bits)).toBe('000' + '01' + '00000000');

      const host = encodeBody(MessageType.SMALL_PASSTHROUGH, { payload: nested }, 9);
      expect(bitsToString(host.bits)).toBe('01' + '0' + '0000100000000');
    });

    it('should reject a nested body from another family', () => {
      const nested = encodePassthroughBody(PassthroughCommand.SMALL_UNLINK_ALL_ACCESSORIES, {});
      expect(() => encodeBody(MessageType.FULL_PASSTHROUGH, { payload: nested }, 1)).toThrow(SchemaMismatchError);
    });

    it('should reject a nested body of the wrong width', () => {
      const nested = encodePassthroughBody(PassthroughCommand.SMALL_UNLINK_ALL_ACCESSORIES, {});
      const truncated = { ...nested, bits: { value: 0n, length: 12 } };
      expect(() => encodeBody(MessageType.SMALL_PASSTHROUGH, { payload: truncated }, 1)).toThrow(FieldRangeError);
    });

    it('should reject a plain number for a payload field', () => {
      expect(() => encodeBody(MessageType.SMALL_PASSTHROUGH, { payload: 5 }, 1)).toThrow(SchemaMismatchError);
    });
  });
});
