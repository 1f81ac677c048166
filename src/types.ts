import type { FieldValues } from './codec/body.js';
import type { FormatOptions } from './codec/keycode.js';
import type { MessageType } from './protocol/types.js';

/**
 * One command to encode. Consumed once; nothing here is retained.
 */
export interface KeycodeMessage {
  readonly type: MessageType;
  /** Caller-supplied field values, keyed by field name */
  readonly fields: FieldValues;
  /** Per-device message id (0 for types without identifier) */
  readonly id: number;
  /** Device secret, at least 16 bytes. Ignored by factory types */
  readonly secretKey: Uint8Array;
}

export type EncodeOptions = FormatOptions;

/**
 * Result of KeycodeGenerator.generate
 */
export interface GeneratedKeycode {
  keycode: string;
  type: MessageType;
  /** Id the keycode was built with; record it as used */
  id: number;
  /** 1 when the first id succeeded */
  attempts: number;
}
