/**
 * Deduplication gate
 *
 * Two contacts for the same card match when name and location are equal and
 * any phone category holds the same non-null number in both. This is looser
 * than comparing the whole tuple: a second extraction that found one extra
 * number for the same person is still a duplicate.
 */

import { PHONE_CATEGORIES, type ContactFieldsV2 } from './types.js';

export interface ContactLookup {
  hasMatchingContact(cardId: string, candidate: ContactFieldsV2): boolean;
}

export function contactsMatch(a: ContactFieldsV2, b: ContactFieldsV2): boolean {
  if (a.name !== b.name || a.location !== b.location) return false;
  return PHONE_CATEGORIES.some((category) => a[category] !== null && a[category] === b[category]);
}

/**
 * Check stored contacts first, then candidates already accepted for this card
 * in the current run but not yet committed.
 */
export function isDuplicate(
  lookup: ContactLookup,
  cardId: string,
  candidate: ContactFieldsV2,
  pending: readonly ContactFieldsV2[] = []
): boolean {
  if (lookup.hasMatchingContact(cardId, candidate)) return true;
  return pending.some((accepted) => contactsMatch(accepted, candidate));
}
