import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { FamilyDefinition } from '../protocol/types.js';

const DammTableSchema = z.object({
  description: z.string().optional(),
  table: z
    .array(z.array(z.number().int().min(0).max(9)).length(10))
    .length(10)
    .refine((rows) => rows.every((row, i) => row[i] === 0), 'Damm table needs a zero diagonal'),
});

const DAMM_TABLE: readonly (readonly number[])[] = DammTableSchema.parse(
  JSON.parse(readFileSync(new URL('../../data/damm-table.json', import.meta.url), 'utf8'))
).table;

/**
 * Damm check digit over decimal digits. Detects every single substitution
 * and every adjacent transposition.
 */
export function dammCheckDigit(digits: readonly number[]): number {
  let interim = 0;
  for (const digit of digits) {
    interim = DAMM_TABLE[interim][digit];
  }
  return interim;
}

/**
 * Weighted sum mod 5 with weights 1, 2, 3, 4 repeating. Every weight and
 * every difference of neighbouring weights is invertible mod 5.
 */
export function weightedMod5CheckDigit(digits: readonly number[]): number {
  let sum = 0;
  digits.forEach((digit, k) => {
    sum += ((k % 4) + 1) * digit;
  });
  return sum % 5;
}

export function checkDigit(scheme: FamilyDefinition['checksum'], digits: readonly number[]): number {
  return scheme === 'damm' ? dammCheckDigit(digits) : weightedMod5CheckDigit(digits);
}

/**
 * Insert a check digit after every `interval` data digits and after a
 * trailing partial block. Each check covers all data digits before it.
 */
export function interleaveCheckDigits(
  data: readonly number[],
  scheme: FamilyDefinition['checksum'],
  interval: number
): number[] {
  const out: number[] = [];
  for (let start = 0; start < data.length; start += interval) {
    const end = Math.min(start + interval, data.length);
    out.push(...data.slice(start, end), checkDigit(scheme, data.slice(0, end)));
  }
  return out;
}

/**
 * Number of check digits added to `dataDigits` digits.
 */
export function checkDigitCount(dataDigits: number, interval: number): number {
  return Math.ceil(dataDigits / interval);
}
