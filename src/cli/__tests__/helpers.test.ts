/**
 * Tests for CLI output formatting
 */

import { describe, it, expect } from 'vitest';
import { createSyncRuntime, formatBoardList, formatReport } from '../helpers.js';
import { ConfigError } from '../../core/errors.js';
import { formatContact } from '../commands/contacts.js';
import { emptyContactCounters, type SyncReport } from '../../sync/index.js';
import type { ContactListing } from '../../core/store.js';

function report(overrides: Partial<SyncReport> = {}): SyncReport {
  return {
    status: 'completed',
    phase: 'idle',
    mode: 'full',
    board: { id: 'board-a', name: 'Leads', closed: false },
    abort: null,
    lists: { seen: 2, inserted: 2 },
    cards: { seen: 3, inserted: 3, failed: 1 },
    comments: { seen: 2, inserted: 1 },
    contacts: { ...emptyContactCounters(), textUnits: 6, committed: 2, rejected: 1, duplicates: 1 },
    cardErrors: [],
    durationMs: 1234,
    ...overrides,
  };
}

describe('formatBoardList', () => {
  it('numbers boards from 1', () => {
    expect(
      formatBoardList([
        { id: 'a', name: 'Leads', closed: false },
        { id: 'b', name: 'Suppliers', closed: false },
      ])
    ).toEqual(['1. Board Name: Leads', '2. Board Name: Suppliers']);
  });
});

describe('formatReport', () => {
  it('summarizes a completed run', () => {
    expect(formatReport(report())).toEqual([
      'Scraping complete for board: Leads',
      'Mode: full resync',
      'Lists: 2 seen, 2 new',
      'Cards: 3 seen, 3 new, 1 failed',
      'Comments: 2 seen, 1 new',
      'Contacts: 2 committed from 6 text units (1 rejected, 1 duplicates, 0 unparsable, 0 failed calls, 0 rolled back)',
      'Duration: 1.2s',
    ]);
  });

  it('leads with the abort reason and skips the mode when unresolved', () => {
    const lines = formatReport(
      report({
        status: 'aborted',
        phase: 'aborted',
        mode: null,
        board: null,
        abort: { stage: 'resolve', error: 'Board not found: Nope' },
      })
    );

    expect(lines[0]).toBe('Sync aborted during resolve: Board not found: Nope');
    expect(lines[1]).toBe('Lists: 2 seen, 2 new');
  });

  it('names incremental runs', () => {
    expect(formatReport(report({ mode: 'incremental' }))[1]).toBe('Mode: incremental update');
  });
});

describe('formatContact', () => {
  it('lists only the populated phone categories', () => {
    const contact: ContactListing = {
      schema: 2,
      id: 1,
      cardId: 'card-1',
      name: 'Jane Citizen',
      location: 'Drouin VIC',
      mobile: '+61400000000',
      landline: null,
      business: '+61356000000',
      cardName: 'Call Jane',
      boardId: 'board-a',
    };

    expect(formatContact(contact)).toBe('Jane Citizen | Drouin VIC | mobile +61400000000, business +61356000000');
  });
});

describe('createSyncRuntime', () => {
  it('refuses to start without credentials', () => {
    const config = {
      provider: 'openai' as const,
      model: 'gpt-4o-mini',
      maxTokens: 100,
      phoneRegion: 'Australian',
      dataDir: './data',
      trelloApiKey: 'test-key',
    };

    expect(() => createSyncRuntime(config, { dataDir: './data' })).toThrow(ConfigError);
  });
});
