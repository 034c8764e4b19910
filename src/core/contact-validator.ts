/**
 * Contact validation & normalization
 *
 * Turns whatever the extractor returned into a schema-2 contact, or a reason it
 * was rejected. Checks run in a fixed order:
 *   1. name and location present
 *   2. at least one phone category populated
 *   3. no populated field is an "unknown" placeholder
 *
 * Phone numbers are trimmed only. Formatting is left to the extraction prompt.
 */

import { PHONE_CATEGORIES, type ContactFieldsV2, type PhoneValue } from './types.js';

/** Extractor output before validation. Any field may be missing. */
export interface RawContact {
  name?: string | null;
  location?: string | null;
  mobile?: string | null;
  landline?: string | null;
  business?: string | null;
}

/** Compared after trimming, case-sensitive. */
export const UNKNOWN_SENTINELS: ReadonlySet<string> = new Set(['N/A', 'not provided', 'Not specified']);

export type RejectionReason = 'missing-name-or-location' | 'no-phone' | 'unknown-sentinel';

export type ValidationResult =
  | { ok: true; contact: ContactFieldsV2 }
  | { ok: false; reason: RejectionReason; field?: keyof RawContact };

function trimmed(value: string | null | undefined): string {
  return (value ?? '').trim();
}

/** Blank phones become `null`, never an empty string. */
export function normalizePhone(value: string | null | undefined): PhoneValue {
  const phone = trimmed(value);
  return phone === '' ? null : phone;
}

export function validateContact(raw: RawContact): ValidationResult {
  const name = trimmed(raw.name);
  const location = trimmed(raw.location);

  if (name === '') return { ok: false, reason: 'missing-name-or-location', field: 'name' };
  if (location === '') return { ok: false, reason: 'missing-name-or-location', field: 'location' };

  const contact: ContactFieldsV2 = {
    schema: 2,
    name,
    location,
    mobile: normalizePhone(raw.mobile),
    landline: normalizePhone(raw.landline),
    business: normalizePhone(raw.business),
  };

  if (PHONE_CATEGORIES.every((category) => contact[category] === null)) {
    return { ok: false, reason: 'no-phone' };
  }

  const populated: Array<[keyof RawContact, string]> = [
    ['name', name],
    ['location', location],
  ];
  for (const category of PHONE_CATEGORIES) {
    const phone = contact[category];
    if (phone !== null) populated.push([category, phone]);
  }

  const sentinel = populated.find(([, value]) => UNKNOWN_SENTINELS.has(value));
  if (sentinel) {
    return { ok: false, reason: 'unknown-sentinel', field: sentinel[0] };
  }

  return { ok: true, contact };
}
