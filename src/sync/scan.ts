/**
 * Card contact scan
 *
 * Runs the extraction pass for one card: every text unit (name, description,
 * stored comments) goes through extract → validate → dedupe, and whatever
 * survives is committed as a single batch.
 */

import type { Card, ContactFieldsV2 } from '../core/types.js';
import type { ContactStore } from '../core/store.js';
import type { ExtractionOutcome } from '../core/contact-extractor.js';
import type { RunLogger } from '../core/logger.js';
import { validateContact } from '../core/contact-validator.js';
import { isDuplicate } from '../core/dedupe.js';
import { StoreError } from '../core/errors.js';

// ============================================================================
// Types
// ============================================================================

export interface ContactExtraction {
  extract(text: string): Promise<ExtractionOutcome>;
}

export type ScanStore = Pick<ContactStore, 'getCommentTexts' | 'hasMatchingContact' | 'commitContacts'>;

export interface ScanDependencies {
  store: ScanStore;
  extractor: ContactExtraction;
  logger: RunLogger;
}

export interface ContactCounters {
  textUnits: number;
  extracted: number;
  accepted: number;
  committed: number;
  rejected: number;
  duplicates: number;
  unparsable: number;
  empty: number;
  failedCalls: number;
  rolledBack: number;
}

const COUNTER_KEYS: ReadonlyArray<keyof ContactCounters> = [
  'textUnits',
  'extracted',
  'accepted',
  'committed',
  'rejected',
  'duplicates',
  'unparsable',
  'empty',
  'failedCalls',
  'rolledBack',
];

export function emptyContactCounters(): ContactCounters {
  return {
    textUnits: 0,
    extracted: 0,
    accepted: 0,
    committed: 0,
    rejected: 0,
    duplicates: 0,
    unparsable: 0,
    empty: 0,
    failedCalls: 0,
    rolledBack: 0,
  };
}

export function addContactCounters(target: ContactCounters, source: ContactCounters): void {
  for (const key of COUNTER_KEYS) {
    target[key] += source[key];
  }
}

// ============================================================================
// Scan
// ============================================================================

/**
 * Card name, description and comment texts, in that order, blanks dropped.
 */
export function gatherTextUnits(card: Card, commentTexts: readonly string[]): string[] {
  return [card.name, card.description, ...commentTexts].filter((text) => text.trim() !== '');
}

type ExtractionMiss = Exclude<ExtractionOutcome, { kind: 'structured' }>;

function recordMiss(
  outcome: ExtractionMiss,
  card: Card,
  text: string,
  counters: ContactCounters,
  logger: RunLogger
): void {
  switch (outcome.kind) {
    case 'unparsable':
      counters.unparsable++;
      logger.log('WARN', `Failed to parse JSON for card ${card.id}. Content: ${outcome.raw}`);
      return;
    case 'empty':
      counters.empty++;
      return;
    case 'failed':
      counters.failedCalls++;
      logger.log(
        'ERROR',
        `Error scanning card ${card.id}. Text: ${text}. Error: ${outcome.error}` +
          (outcome.transient ? ` (transient, ${outcome.attempts} attempt(s))` : '')
      );
      return;
  }
}

export async function scanCardForContacts(card: Card, deps: ScanDependencies): Promise<ContactCounters> {
  const { store, extractor, logger } = deps;
  const counters = emptyContactCounters();
  const accepted: ContactFieldsV2[] = [];

  const textUnits = gatherTextUnits(card, store.getCommentTexts(card.id));
  counters.textUnits = textUnits.length;

  for (const text of textUnits) {
    const outcome = await extractor.extract(text);

    if (outcome.kind !== 'structured') {
      recordMiss(outcome, card, text, counters, logger);
      continue;
    }
    counters.extracted++;

    const validation = validateContact(outcome.fields);
    if (!validation.ok) {
      counters.rejected++;
      logger.log(
        'SKIP',
        `Skipping invalid or incomplete record for card ${card.id} (${validation.reason}). Extracted data: ${JSON.stringify(outcome.fields)}`
      );
      continue;
    }

    if (isDuplicate(store, card.id, validation.contact, accepted)) {
      counters.duplicates++;
      logger.log('SKIP', `Skipping duplicate record for card ${card.id}. Extracted data: ${JSON.stringify(validation.contact)}`);
      continue;
    }

    accepted.push(validation.contact);
  }

  counters.accepted = accepted.length;
  if (accepted.length === 0) return counters;

  try {
    counters.committed = store.commitContacts(card.id, accepted);
  } catch (error) {
    if (!(error instanceof StoreError)) throw error;
    counters.rolledBack++;
    logger.log('ERROR', `Database insertion failed for card ${card.id}: ${error.message}`);
  }

  return counters;
}
