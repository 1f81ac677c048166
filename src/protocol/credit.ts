import { FieldRangeError } from '../errors.js';
import { SMALL_LOCK_INCREMENT, SMALL_UNLOCK_INCREMENT } from './registry.js';

/**
 * Piecewise day ranges for Small-family credit increments. Each band starts at
 * `fromDay` with increment `base` and advances one increment every `step` days.
 */
interface CreditBand {
  readonly fromDay: number;
  readonly toDay: number;
  readonly base: number;
  readonly step: number;
}

const ADD_CREDIT_BANDS: readonly CreditBand[] = [
  { fromDay: 1, toDay: 180, base: 0, step: 1 },
  { fromDay: 181, toDay: 405, base: 180, step: 3 },
];

const SET_CREDIT_BANDS: readonly CreditBand[] = [
  { fromDay: 1, toDay: 90, base: 0, step: 1 },
  { fromDay: 91, toDay: 180, base: 90, step: 2 },
  { fromDay: 181, toDay: 360, base: 135, step: 4 },
  { fromDay: 361, toDay: 720, base: 180, step: 8 },
  { fromDay: 721, toDay: 1184, base: 225, step: 16 },
];

export const MAX_ADD_CREDIT_DAYS = 405;
export const MAX_SET_CREDIT_DAYS = 1184;

function bandIncrement(bands: readonly CreditBand[], days: number, field: string): number {
  if (!Number.isInteger(days)) {
    throw new FieldRangeError(field, days, `${field} must be an integer`);
  }
  for (const band of bands) {
    if (days >= band.fromDay && days <= band.toDay) {
      return band.base + Math.floor((days - band.fromDay) / band.step);
    }
  }
  throw new FieldRangeError(field, days, `${field} out of range: ${days}`);
}

/**
 * Increment for a Small add-credit code. Durations between representable
 * steps round down.
 */
export function addCreditIncrement(days: number | 'unlock'): number {
  if (days === 'unlock') return SMALL_UNLOCK_INCREMENT;
  return bandIncrement(ADD_CREDIT_BANDS, days, 'days');
}

/**
 * Increment for a Small set-credit code. Zero days locks the device.
 */
export function setCreditIncrement(days: number | 'unlock'): number {
  if (days === 'unlock') return SMALL_UNLOCK_INCREMENT;
  if (days === 0) return SMALL_LOCK_INCREMENT;
  return bandIncrement(SET_CREDIT_BANDS, days, 'days');
}
