/**
 * cardscan - Core Types
 *
 * Two layers:
 * 1. Board hierarchy - boards, lists, cards and comments mirrored from Trello
 * 2. Contacts - structured records extracted from card text
 */

// ============================================================================
// Board Hierarchy
// ============================================================================

export interface Board {
  id: string;
  name: string;
  closed: boolean;
}

export interface BoardList {
  id: string;
  name: string;
  boardId: string;
}

export interface Card {
  id: string;
  name: string;
  description: string;
  listId: string;
  boardId: string;
}

export interface CardComment {
  id: string;
  cardId: string;
  text: string;
}

// ============================================================================
// Contacts
// ============================================================================

export const PHONE_CATEGORIES = ['mobile', 'landline', 'business'] as const;

export type PhoneCategory = (typeof PHONE_CATEGORIES)[number];

/** `null` is the absent marker. Stored phone fields are never empty strings. */
export type PhoneValue = string | null;

/** Original layout: one generic phone field. */
export interface ContactFieldsV1 {
  schema: 1;
  name: string;
  location: string;
  phone: PhoneValue;
}

/** Current layout: one field per phone category. */
export interface ContactFieldsV2 {
  schema: 2;
  name: string;
  location: string;
  mobile: PhoneValue;
  landline: PhoneValue;
  business: PhoneValue;
}

export type ContactFields = ContactFieldsV1 | ContactFieldsV2;

export interface Contact extends ContactFieldsV2 {
  id: number;
  cardId: string;
}

/**
 * Bring contact fields of any schema version up to the current one.
 * A v1 generic phone is treated as a mobile number.
 */
export function upgradeContactFields(fields: ContactFields): ContactFieldsV2 {
  switch (fields.schema) {
    case 2:
      return fields;
    case 1:
      return {
        schema: 2,
        name: fields.name,
        location: fields.location,
        mobile: fields.phone,
        landline: null,
        business: null,
      };
  }
}
