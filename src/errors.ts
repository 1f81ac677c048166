import type { MessageType } from './protocol/types.js';

export type KeycodeErrorCode =
  | 'field_range'
  | 'schema_mismatch'
  | 'id_collision'
  | 'encoding_overflow'
  | 'secret_key'
  | 'config';

/**
 * Base class for every failure raised while building a keycode.
 *
 * `context` carries structured detail for logs. It never holds key material.
 */
export class KeycodeError extends Error {
  override readonly name: string = 'KeycodeError';

  constructor(
    public readonly code: KeycodeErrorCode,
    message: string,
    public readonly context?: Readonly<Record<string, unknown>>
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * A field value does not fit its bit width or declared domain.
 */
export class FieldRangeError extends KeycodeError {
  override readonly name = 'FieldRangeError';

  constructor(
    public readonly field: string,
    public readonly value: unknown,
    message: string
  ) {
    super('field_range', message, { field });
  }
}

/**
 * Supplied values do not match the declared schema of a message type.
 */
export class SchemaMismatchError extends KeycodeError {
  override readonly name = 'SchemaMismatchError';

  constructor(message: string, context?: Readonly<Record<string, unknown>>) {
    super('schema_mismatch', message, context);
  }
}

/**
 * The chosen id makes the code ambiguous with another message interpretation.
 * Retry with `nextId`.
 */
export class IdCollisionError extends KeycodeError {
  override readonly name = 'IdCollisionError';

  constructor(
    public readonly type: MessageType,
    public readonly id: number,
    public readonly nextId: number,
    public readonly rival: MessageType
  ) {
    super('id_collision', `Id ${id} collides with ${rival} for ${type}; retry with id ${nextId}`, {
      type,
      id,
      nextId,
      rival,
    });
  }
}

/**
 * The authenticated value does not fit the fixed digit count of its type.
 * Indicates a registry inconsistency.
 */
export class EncodingOverflowError extends KeycodeError {
  override readonly name = 'EncodingOverflowError';

  constructor(
    public readonly type: MessageType,
    public readonly digits: number
  ) {
    super('encoding_overflow', `Value for ${type} does not fit in ${digits} digits`, { type, digits });
  }
}

/**
 * Key material has the wrong length. The key itself is never included.
 */
export class SecretKeyError extends KeycodeError {
  override readonly name = 'SecretKeyError';

  constructor(message: string, length: number) {
    super('secret_key', message, { length });
  }
}

export class ConfigError extends KeycodeError {
  override readonly name = 'ConfigError';

  constructor(message: string, context?: Readonly<Record<string, unknown>>) {
    super('config', message, context);
  }
}
