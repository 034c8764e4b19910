/**
 * Tests for the per-card contact scan
 *
 * Uses an in-memory ContactStore and a scripted extractor.
 * Covers: text unit order, validation and dedupe paths, tolerance of
 * unparsable and failed extractions, and rollback reporting.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { scanCardForContacts, gatherTextUnits, addContactCounters, emptyContactCounters } from '../scan.js';
import { ContactStore } from '../../core/store.js';
import { MemoryRunLogger } from '../../core/logger.js';
import { ScriptedExtractor, makeCard } from './fixtures/index.js';

const card = makeCard('card-1', 'list-1', 'board-a', 'Call Jane', 'Jane Citizen, Drouin VIC, 0400 000 000');
const jane = { name: 'Jane Citizen', location: 'Drouin VIC', mobile: '+61400000000', landline: null, business: null };

let store: ContactStore;
let logger: MemoryRunLogger;
let extractor: ScriptedExtractor;

beforeEach(() => {
  store = ContactStore.open(':memory:');
  logger = new MemoryRunLogger();
  extractor = new ScriptedExtractor();
  store.insertCardIfAbsent(card);
});

afterEach(() => {
  store.close();
});

describe('gatherTextUnits', () => {
  it('orders name, description, comments and drops blanks', () => {
    expect(gatherTextUnits(makeCard('c', 'l', 'b', 'Name', '  '), ['first', '', 'second'])).toEqual([
      'Name',
      'first',
      'second',
    ]);
  });
});

describe('scanCardForContacts', () => {
  it('sends every stored text unit to the extractor in order', async () => {
    store.insertCommentIfAbsent({ id: 'c-1', cardId: 'card-1', text: 'Office line 03 5600 0000' });

    const counters = await scanCardForContacts(card, { store, extractor, logger });

    expect(extractor.seen).toEqual(['Call Jane', 'Jane Citizen, Drouin VIC, 0400 000 000', 'Office line 03 5600 0000']);
    expect(counters.textUnits).toBe(3);
    expect(counters.empty).toBe(3);
    expect(counters.committed).toBe(0);
  });

  it('commits a valid contact', async () => {
    extractor.on(card.description, jane);

    const counters = await scanCardForContacts(card, { store, extractor, logger });

    expect(counters).toMatchObject({ extracted: 1, accepted: 1, committed: 1, rejected: 0 });
    expect(store.listContacts().map((c) => [c.name, c.mobile])).toEqual([['Jane Citizen', '+61400000000']]);
  });

  it('logs and skips an invalid contact', async () => {
    extractor.on(card.description, { ...jane, mobile: 'N/A' });

    const counters = await scanCardForContacts(card, { store, extractor, logger });

    expect(counters.rejected).toBe(1);
    expect(store.counts().contacts).toBe(0);
    expect(logger.messages('SKIP')).toEqual([
      `Skipping invalid or incomplete record for card card-1 (unknown-sentinel). Extracted data: ${JSON.stringify({ ...jane, mobile: 'N/A' })}`,
    ]);
  });

  it('skips a contact already stored for the card', async () => {
    store.commitContacts('card-1', [{ schema: 2, ...jane }]);
    extractor.on(card.description, { ...jane, business: '+61356000000' });

    const counters = await scanCardForContacts(card, { store, extractor, logger });

    expect(counters.duplicates).toBe(1);
    expect(store.counts().contacts).toBe(1);
  });

  it('keeps only the first of two matching contacts in one card', async () => {
    extractor.on(card.name, jane).on(card.description, { ...jane, landline: '+61356000000' });

    const counters = await scanCardForContacts(card, { store, extractor, logger });

    expect(counters).toMatchObject({ accepted: 1, duplicates: 1, committed: 1 });
    expect(store.listContacts()[0]?.landline).toBeNull();
  });

  it('keeps going after an unparsable reply or a failed call', async () => {
    store.insertCommentIfAbsent({ id: 'c-1', cardId: 'card-1', text: 'Jane again' });
    extractor
      .onOutcome(card.name, { kind: 'unparsable', raw: 'not json', reason: 'No JSON object found in response' })
      .onOutcome(card.description, { kind: 'failed', error: 'Connection error.', transient: true, attempts: 1 })
      .on('Jane again', jane);

    const counters = await scanCardForContacts(card, { store, extractor, logger });

    expect(counters).toMatchObject({ unparsable: 1, failedCalls: 1, committed: 1 });
    expect(logger.messages('WARN')).toEqual(['Failed to parse JSON for card card-1. Content: not json']);
    expect(logger.messages('ERROR')).toEqual([
      'Error scanning card card-1. Text: Jane Citizen, Drouin VIC, 0400 000 000. Error: Connection error. (transient, 1 attempt(s))',
    ]);
  });

  it('reports a rolled-back batch and leaves no rows', async () => {
    store.db.exec(`
      CREATE TRIGGER reject_second BEFORE INSERT ON contacts
      WHEN NEW.name = 'John Citizen'
      BEGIN
        SELECT RAISE(ABORT, 'rejected by test trigger');
      END;
    `);
    extractor.on(card.name, jane).on(card.description, { ...jane, name: 'John Citizen', mobile: '+61400000001' });

    const counters = await scanCardForContacts(card, { store, extractor, logger });

    expect(counters).toMatchObject({ accepted: 2, committed: 0, rolledBack: 1 });
    expect(store.counts().contacts).toBe(0);
    expect(logger.messages('ERROR')).toEqual([
      'Database insertion failed for card card-1: Contact batch for card card-1 rolled back: rejected by test trigger',
    ]);
  });

  it('rethrows errors that are not store failures', async () => {
    const failing = {
      async extract(): Promise<never> {
        throw new Error('extractor bug');
      },
    };
    await expect(scanCardForContacts(card, { store, extractor: failing, logger })).rejects.toThrow('extractor bug');
  });
});

describe('addContactCounters', () => {
  it('adds every counter', () => {
    const total = emptyContactCounters();
    addContactCounters(total, { ...emptyContactCounters(), textUnits: 3, committed: 1 });
    addContactCounters(total, { ...emptyContactCounters(), textUnits: 2, duplicates: 1 });
    expect(total).toEqual({ ...emptyContactCounters(), textUnits: 5, committed: 1, duplicates: 1 });
  });
});
