/**
 * Conversation key normalization
 * String keys are canonical; integer keys only survive on legacy records
 */

import type { StoredSenderId } from './types.js';

const NUMERIC_KEY = /^[0-9]+$/;

/**
 * True when the identifier could have been stored as an integer by older writers
 */
export function isLegacyNumericKey(senderId: string): boolean {
  return NUMERIC_KEY.test(senderId);
}

/**
 * The integer a legacy record would carry for this key.
 * Returns null for non-numeric keys and for values beyond the safe integer range,
 * which cannot be matched exactly.
 */
export function toLegacyNumericKey(senderId: string): number | null {
  if (!isLegacyNumericKey(senderId)) return null;
  const value = Number(senderId);
  return Number.isSafeInteger(value) ? value : null;
}

export function normalizeSenderId(value: StoredSenderId): string {
  return typeof value === 'number' ? String(value) : value;
}
