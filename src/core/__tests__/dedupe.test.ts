/**
 * Tests for the deduplication gate
 *
 * Matching rule: same name and location plus one shared non-null phone in the
 * same category. The pending batch is checked after the store.
 */

import { describe, it, expect, vi } from 'vitest';
import { contactsMatch, isDuplicate, type ContactLookup } from '../dedupe.js';
import type { ContactFieldsV2 } from '../types.js';

function contact(overrides: Partial<ContactFieldsV2> = {}): ContactFieldsV2 {
  return {
    schema: 2,
    name: 'Jane Citizen',
    location: 'Drouin VIC',
    mobile: '+61400000000',
    landline: null,
    business: null,
    ...overrides,
  };
}

describe('contactsMatch', () => {
  it('matches on a shared mobile number', () => {
    expect(contactsMatch(contact(), contact({ landline: '+61356000000' }))).toBe(true);
  });

  it('does not match the same number in different categories', () => {
    const a = contact({ mobile: null, landline: '+61356000000' });
    const b = contact({ mobile: null, business: '+61356000000' });
    expect(contactsMatch(a, b)).toBe(false);
  });

  it('does not treat two nulls as a shared number', () => {
    const a = contact({ mobile: null, landline: '+61356000000' });
    const b = contact({ mobile: null, landline: '+61356000001' });
    expect(contactsMatch(a, b)).toBe(false);
  });

  it('requires the same name and location', () => {
    expect(contactsMatch(contact(), contact({ name: 'John Citizen' }))).toBe(false);
    expect(contactsMatch(contact(), contact({ location: 'Warragul VIC' }))).toBe(false);
  });
});

describe('isDuplicate', () => {
  it('reports a stored match without checking the pending batch', () => {
    const lookup: ContactLookup = { hasMatchingContact: vi.fn().mockReturnValue(true) };
    expect(isDuplicate(lookup, 'card-1', contact())).toBe(true);
    expect(lookup.hasMatchingContact).toHaveBeenCalledWith('card-1', contact());
  });

  it('reports a match against the pending batch', () => {
    const lookup: ContactLookup = { hasMatchingContact: () => false };
    expect(isDuplicate(lookup, 'card-1', contact(), [contact({ business: '+61356000009' })])).toBe(true);
  });

  it('lets a new contact through', () => {
    const lookup: ContactLookup = { hasMatchingContact: () => false };
    expect(isDuplicate(lookup, 'card-1', contact(), [contact({ mobile: '+61400000001' })])).toBe(false);
  });
});
