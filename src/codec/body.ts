import { FieldRangeError, SchemaMismatchError } from '../errors.js';
import {
  FAMILIES,
  PASSTHROUGH_FAMILIES,
  getMessageDefinition,
  getPassthroughDefinition,
} from '../protocol/registry.js';
import type {
  BodyLayout,
  FieldSpec,
  MessageType,
  PassthroughCommand,
  PassthroughFamily,
} from '../protocol/types.js';
import { concatBits, uintToBits, type BitString } from './bits.js';

/** Largest message id: ids are unsigned 32-bit counters */
export const MAX_ID = 0xffffffff;

/**
 * Packed body of a message or nested command.
 * `values` holds the resolved number written for every field.
 */
export interface Body<T extends string = MessageType> {
  readonly type: T;
  readonly bits: BitString;
  readonly values: Readonly<Record<string, number>>;
}

export interface PassthroughBody extends Body<PassthroughCommand> {
  readonly family: PassthroughFamily;
}

/**
 * Caller-supplied value: a number for `uint` fields, a member name for
 * `enum` fields, a nested body for `payload` fields.
 */
export type FieldValue = number | string | PassthroughBody;

export type FieldValues = Readonly<Record<string, FieldValue>>;

/**
 * Pack the fields of a message type into its fixed-width body.
 *
 * @param id - message id; its low bits fill the type's identifier field
 */
export function encodeBody(type: MessageType, values: FieldValues, id: number = 0): Body {
  const definition = getMessageDefinition(type);
  validateId(id, definition.identified);

  const { bits, resolved } = packLayout(definition, FAMILIES[definition.family].opcodeWidth, values, id, type);
  return { type, bits, values: resolved };
}

/**
 * Pack a nested command. The result is carried opaquely by a passthrough message.
 */
export function encodePassthroughBody(command: PassthroughCommand, values: FieldValues): PassthroughBody {
  const definition = getPassthroughDefinition(command);
  const { opcodeWidth } = PASSTHROUGH_FAMILIES[definition.family];

  const { bits, resolved } = packLayout(definition, opcodeWidth, values, 0, command);
  return { type: command, family: definition.family, bits, values: resolved };
}

export function validateId(id: number, identified: boolean): void {
  if (!Number.isInteger(id) || id < 0 || id > MAX_ID) {
    throw new FieldRangeError('id', id, `id must be an integer in 0..${MAX_ID}`);
  }
  if (!identified && id !== 0) {
    throw new FieldRangeError('id', id, 'id must be 0 for a type without identifier');
  }
}

function isCallerSupplied(field: FieldSpec): boolean {
  const { kind } = field.domain;
  return kind === 'uint' || kind === 'enum' || kind === 'payload';
}

function packLayout(
  layout: BodyLayout,
  opcodeWidth: number,
  values: FieldValues,
  id: number,
  label: string
): { bits: BitString; resolved: Record<string, number> } {
  const expected = new Set(layout.fields.filter(isCallerSupplied).map((field) => field.name));
  for (const name of Object.keys(values)) {
    if (!expected.has(name)) {
      throw new SchemaMismatchError(`Unexpected field "${name}" for ${label}`, { type: label, field: name });
    }
  }

  const parts: BitString[] = [uintToBits(layout.opcode, opcodeWidth)];
  const resolved: Record<string, number> = {};

  for (const field of layout.fields) {
    const resolvedValue = resolveField(field, values, id, label);
    resolved[field.name] = resolvedValue.number;
    parts.push(resolvedValue.bits);
  }

  return { bits: concatBits(...parts), resolved };
}

function resolveField(
  field: FieldSpec,
  values: FieldValues,
  id: number,
  label: string
): { number: number; bits: BitString } {
  const domain = field.domain;

  switch (domain.kind) {
    case 'constant':
      return { number: domain.value, bits: uintToBits(domain.value, field.width) };

    case 'identifier': {
      const low = id % 2 ** field.width;
      return { number: low, bits: uintToBits(low, field.width) };
    }

    case 'uint': {
      const raw = requireValue(field, values, label);
      if (typeof raw !== 'number') {
        throw new SchemaMismatchError(`Field "${field.name}" expects a number`, { type: label, field: field.name });
      }
      const max = domain.max ?? 2 ** field.width - 1;
      if (!Number.isInteger(raw) || raw < 0 || raw > max) {
        throw new FieldRangeError(field.name, raw, `${field.name} must be an integer in 0..${max}, got ${raw}`);
      }
      return { number: raw, bits: uintToBits(raw, field.width) };
    }

    case 'enum': {
      const raw = requireValue(field, values, label);
      if (typeof raw !== 'string') {
        throw new SchemaMismatchError(`Field "${field.name}" expects one of ${Object.keys(domain.members).join(', ')}`, {
          type: label,
          field: field.name,
        });
      }
      if (!Object.hasOwn(domain.members, raw)) {
        throw new FieldRangeError(field.name, raw, `Unknown ${field.name} "${raw}"`);
      }
      const code = domain.members[raw];
      return { number: code, bits: uintToBits(code, field.width) };
    }

    case 'payload': {
      const raw = requireValue(field, values, label);
      if (typeof raw !== 'object') {
        throw new SchemaMismatchError(`Field "${field.name}" expects a nested command body`, {
          type: label,
          field: field.name,
        });
      }
      if (raw.family !== domain.family) {
        throw new SchemaMismatchError(`Field "${field.name}" expects a ${domain.family} command, got ${raw.family}`, {
          type: label,
          field: field.name,
        });
      }
      if (raw.bits.length !== field.width) {
        throw new FieldRangeError(
          field.name,
          raw.bits.length,
          `${field.name} must be ${field.width} bits, got ${raw.bits.length}`
        );
      }
      return { number: Number(raw.bits.value), bits: raw.bits };
    }
  }
}

function requireValue(field: FieldSpec, values: FieldValues, label: string): FieldValue {
  const raw: FieldValue | undefined = values[field.name];
  if (raw === undefined) {
    throw new SchemaMismatchError(`Missing field "${field.name}" for ${label}`, { type: label, field: field.name });
  }
  return raw;
}
