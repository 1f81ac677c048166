import { describe, it, expect } from 'vitest';
import {
  FAMILIES,
  PASSTHROUGH_FAMILIES,
  MessageType,
  PassthroughCommand,
  bodyWidth,
  passthroughWidth,
  deriveCollisionRules,
  getCollisionRules,
  getMessageDefinition,
  getPassthroughDefinition,
  listMessageDefinitions,
  listPassthroughDefinitions,
  addCreditIncrement,
  setCreditIncrement,
  MAX_ADD_CREDIT_DAYS,
  MAX_SET_CREDIT_DAYS,
} from '../src/protocol/index.js';
import { checkDigitCount } from '../src/codec/index.js';
import { FieldRangeError } from '../src/errors.js';

describe('Protocol Definition Registry', () => {
  it('should define every message type and nested command', () => {
    for (const type of Object.values(MessageType)) {
      expect(getMessageDefinition(type).type).toBe(type);
    }
    for (const command of Object.values(PassthroughCommand)) {
      expect(getPassthroughDefinition(command).command).toBe(command);
    }
    expect(listMessageDefinitions()).toHaveLength(Object.values(MessageType).length);
    expect(listPassthroughDefinitions()).toHaveLength(Object.values(PassthroughCommand).length);
  });

  it('should size every Small type to 28 bits', () => {
    for (const definition of listMessageDefinitions().filter((d) => d.family === 'small')) {
      expect(bodyWidth(definition) + definition.authWidth, definition.type).toBe(28);
    }
  });

  it('should size nested commands to their family width', () => {
    for (const definition of listPassthroughDefinitions()) {
      expect(passthroughWidth(definition), definition.command).toBe(PASSTHROUGH_FAMILIES[definition.family].width);
    }
  });

  it('should match payload field widths to nested family widths', () => {
    for (const definition of listMessageDefinitions()) {
      for (const field of definition.fields) {
        if (field.domain.kind === 'payload') {
          expect(field.width).toBe(PASSTHROUGH_FAMILIES[field.domain.family].width);
        }
      }
    }
  });

  it('should declare the minimum digit count that holds each type', () => {
    for (const definition of listMessageDefinitions()) {
      const base = BigInt(FAMILIES[definition.family].base);
      const limit = 1n << BigInt(bodyWidth(definition) + definition.authWidth);
      expect(base ** BigInt(definition.digits) >= limit, definition.type).toBe(true);
      expect(base ** BigInt(definition.digits - 1) < limit, definition.type).toBe(true);
    }
  });

  it('should yield the documented keycode lengths', () => {
    const total = (type: MessageType): number => {
      const definition = getMessageDefinition(type);
      return definition.digits + checkDigitCount(definition.digits, FAMILIES[definition.family].checkInterval);
    };
    expect(total(MessageType.FULL_ADD_CREDIT)).toBe(18);
    expect(total(MessageType.FULL_FACTORY_ALLOW_TEST)).toBe(10);
    expect(total(MessageType.FULL_PASSTHROUGH)).toBe(29);
    expect(total(MessageType.SMALL_ADD_CREDIT)).toBe(15);
  });

  it('should keep every value domain inside its width', () => {
    const all = [...listMessageDefinitions(), ...listPassthroughDefinitions()];
    for (const definition of all) {
      for (const field of definition.fields) {
        const limit = 2 ** field.width;
        const domain = field.domain;
        if (domain.kind === 'uint' && domain.max !== undefined) expect(domain.max).toBeLessThan(limit);
        if (domain.kind === 'constant') expect(domain.value).toBeLessThan(limit);
        if (domain.kind === 'enum') {
          for (const code of Object.values(domain.members)) expect(code).toBeLessThan(limit);
        }
      }
    }
  });

  it('should give types sharing an opcode and layout distinct auth tags', () => {
    const custom = getMessageDefinition(MessageType.SMALL_CUSTOM_COMMAND);
    const extended = getMessageDefinition(MessageType.SMALL_EXTENDED_SET_CREDIT_WIPE_FLAG);
    expect(custom.opcode).toBe(extended.opcode);
    expect(custom.authTag).not.toBe(extended.authTag);
  });

  describe('collision table', () => {
    it('should pair the overloaded Small types with each other', () => {
      const rules = deriveCollisionRules().filter((rule) => rule.kind === 'discriminator');
      expect(rules).toEqual([
        {
          kind: 'discriminator',
          type: MessageType.SMALL_CUSTOM_COMMAND,
          rival: MessageType.SMALL_EXTENDED_SET_CREDIT_WIPE_FLAG,
          discriminatorWidth: 4,
        },
        {
          kind: 'discriminator',
          type: MessageType.SMALL_EXTENDED_SET_CREDIT_WIPE_FLAG,
          rival: MessageType.SMALL_CUSTOM_COMMAND,
          discriminatorWidth: 4,
        },
      ]);
    });

    it('should reserve the legacy test pattern of Small set credit', () => {
      expect(getCollisionRules(MessageType.SMALL_SET_CREDIT)).toEqual([
        {
          kind: 'reserved-pattern',
          type: MessageType.SMALL_SET_CREDIT,
          rival: MessageType.SMALL_FACTORY_TEST,
          values: { id: 63, increment: 0 },
        },
      ]);
    });

    it('should leave other types without rules', () => {
      expect(getCollisionRules(MessageType.FULL_ADD_CREDIT)).toEqual([]);
      expect(getCollisionRules(MessageType.SMALL_PASSTHROUGH)).toEqual([]);
    });
  });

  describe('credit increments', () => {
    it('should map add-credit days', () => {
      expect(addCreditIncrement(1)).toBe(0);
      expect(addCreditIncrement(180)).toBe(179);
      expect(addCreditIncrement(181)).toBe(180);
      expect(addCreditIncrement(183)).toBe(180);
      expect(addCreditIncrement(184)).toBe(181);
      expect(addCreditIncrement(MAX_ADD_CREDIT_DAYS)).toBe(254);
      expect(addCreditIncrement('unlock')).toBe(255);
    });

    it('should map set-credit days', () => {
      expect(setCreditIncrement(0)).toBe(254);
      expect(setCreditIncrement(90)).toBe(89);
      expect(setCreditIncrement(91)).toBe(90);
      expect(setCreditIncrement(180)).toBe(134);
      expect(setCreditIncrement(181)).toBe(135);
      expect(setCreditIncrement(361)).toBe(180);
      expect(setCreditIncrement(721)).toBe(225);
      expect(setCreditIncrement(1000)).toBe(242);
      expect(setCreditIncrement(1184)).toBe(253);
      expect(setCreditIncrement(MAX_SET_CREDIT_DAYS)).toBe(253);
      expect(setCreditIncrement('unlock')).toBe(255);
    });

    it('should reject durations outside the tables', () => {
      expect(() => addCreditIncrement(0)).toThrow(FieldRangeError);
      expect(() => addCreditIncrement(MAX_ADD_CREDIT_DAYS + 1)).toThrow(FieldRangeError);
      expect(() => setCreditIncrement(1185)).toThrow(FieldRangeError);
      expect(() => setCreditIncrement(2.5)).toThrow(FieldRangeError);
    });
  });
});
