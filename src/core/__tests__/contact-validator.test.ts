/**
 * Tests for contact validation
 *
 * Covers: required name/location, the at-least-one-phone rule, placeholder
 * rejection, trimming, and blank phones becoming null.
 */

import { describe, it, expect } from 'vitest';
import { validateContact, normalizePhone } from '../contact-validator.js';

describe('validateContact', () => {
  it('accepts a contact with name, location and one phone', () => {
    const result = validateContact({ name: 'Jane Citizen', location: 'Drouin VIC', mobile: '+61400000000' });

    expect(result).toEqual({
      ok: true,
      contact: {
        schema: 2,
        name: 'Jane Citizen',
        location: 'Drouin VIC',
        mobile: '+61400000000',
        landline: null,
        business: null,
      },
    });
  });

  it('trims every field', () => {
    const result = validateContact({
      name: '  Jane Citizen ',
      location: ' Drouin VIC',
      landline: ' +61356000000 ',
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.contact.name).toBe('Jane Citizen');
    expect(result.contact.location).toBe('Drouin VIC');
    expect(result.contact.landline).toBe('+61356000000');
  });

  it('rejects a missing name', () => {
    expect(validateContact({ location: 'Drouin VIC', mobile: '+61400000000' })).toEqual({
      ok: false,
      reason: 'missing-name-or-location',
      field: 'name',
    });
  });

  it('rejects a blank location', () => {
    expect(validateContact({ name: 'Jane', location: '   ', mobile: '+61400000000' })).toEqual({
      ok: false,
      reason: 'missing-name-or-location',
      field: 'location',
    });
  });

  it('rejects a contact with no phone in any category', () => {
    expect(validateContact({ name: 'Jane', location: 'Drouin VIC' })).toEqual({ ok: false, reason: 'no-phone' });
  });

  it('treats whitespace-only phones as absent', () => {
    expect(validateContact({ name: 'Jane', location: 'Drouin VIC', mobile: '  ', landline: '', business: null })).toEqual({
      ok: false,
      reason: 'no-phone',
    });
  });

  it('rejects a placeholder in a phone field', () => {
    expect(validateContact({ name: 'Jane', location: 'Drouin VIC', mobile: 'N/A' })).toEqual({
      ok: false,
      reason: 'unknown-sentinel',
      field: 'mobile',
    });
  });

  it('rejects a placeholder in location even when a phone is present', () => {
    expect(validateContact({ name: 'Jane', location: 'not provided', business: '+61356000000' })).toEqual({
      ok: false,
      reason: 'unknown-sentinel',
      field: 'location',
    });
  });

  it('rejects "Not specified" as a name', () => {
    const result = validateContact({ name: 'Not specified', location: 'Drouin VIC', mobile: '+61400000000' });
    expect(result).toEqual({ ok: false, reason: 'unknown-sentinel', field: 'name' });
  });

  it('compares placeholders case-sensitively', () => {
    const result = validateContact({ name: 'Jane', location: 'Drouin VIC', mobile: 'n/a' });
    expect(result.ok).toBe(true);
  });

  it('checks the phone rule before placeholders', () => {
    // name is a placeholder, but no phone is reported first
    expect(validateContact({ name: 'N/A', location: 'Drouin VIC' })).toEqual({ ok: false, reason: 'no-phone' });
  });
});

describe('normalizePhone', () => {
  it('returns null for missing or blank values', () => {
    expect(normalizePhone(undefined)).toBeNull();
    expect(normalizePhone(null)).toBeNull();
    expect(normalizePhone(' \t ')).toBeNull();
  });

  it('keeps the number as written apart from trimming', () => {
    expect(normalizePhone(' 0400 000 000 ')).toBe('0400 000 000');
  });
});
