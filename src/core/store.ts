/**
 * Store - SQLite persistence for the board hierarchy and extracted contacts
 *
 * Lists, cards and comments are insert-if-absent and never updated. Contacts
 * are committed per card in a single transaction. `truncate` is the only way
 * rows are removed.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';

import type { BoardList, Card, CardComment, Contact, ContactFieldsV2 } from './types.js';
import { StoreError, errorMessage } from './errors.js';
import { migrate, readSchemaVersion, type MigrationResult } from './store-schema.js';

// ============================================================================
// Row Types
// ============================================================================

interface ContactRow {
  id: number;
  card_id: string;
  name: string;
  location: string;
  mobile: string | null;
  landline: string | null;
  business: string | null;
}

interface ContactListingRow extends ContactRow {
  card_name: string | null;
  board_id: string | null;
}

export interface ContactListing extends Contact {
  cardName: string | null;
  boardId: string | null;
}

export interface StoreCounts {
  lists: number;
  cards: number;
  comments: number;
  contacts: number;
}

function toContact(row: ContactRow): Contact {
  return {
    schema: 2,
    id: row.id,
    cardId: row.card_id,
    name: row.name,
    location: row.location,
    mobile: row.mobile,
    landline: row.landline,
    business: row.business,
  };
}

// ============================================================================
// Store
// ============================================================================

export class ContactStore {
  readonly db: Database.Database;
  readonly migration: MigrationResult;

  constructor(db: Database.Database) {
    this.db = db;
    this.migration = migrate(db);
  }

  /**
   * Open (or create) the database at `dbPath` and bring its schema up to date.
   * Pass ':memory:' for a throwaway store.
   */
  static open(dbPath: string): ContactStore {
    if (dbPath !== ':memory:') {
      mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
    return new ContactStore(db);
  }

  close(): void {
    this.db.close();
  }

  schemaVersion(): number {
    return readSchemaVersion(this.db);
  }

  // --------------------------------------------------------------------------
  // Board hierarchy (insert-if-absent)
  // --------------------------------------------------------------------------

  insertListIfAbsent(list: BoardList): boolean {
    const result = this.db
      .prepare(`INSERT OR IGNORE INTO lists (id, name, board_id) VALUES (?, ?, ?)`)
      .run(list.id, list.name, list.boardId);
    return result.changes > 0;
  }

  insertCardIfAbsent(card: Card): boolean {
    const result = this.db
      .prepare(`INSERT OR IGNORE INTO cards (id, name, description, list_id, board_id) VALUES (?, ?, ?, ?, ?)`)
      .run(card.id, card.name, card.description, card.listId, card.boardId);
    return result.changes > 0;
  }

  insertCommentIfAbsent(comment: CardComment): boolean {
    const result = this.db
      .prepare(`INSERT OR IGNORE INTO comments (id, card_id, text) VALUES (?, ?, ?)`)
      .run(comment.id, comment.cardId, comment.text);
    return result.changes > 0;
  }

  getCommentTexts(cardId: string): string[] {
    return this.db
      .prepare<[string], { text: string | null }>(`SELECT text FROM comments WHERE card_id = ? ORDER BY rowid`)
      .all(cardId)
      .flatMap((row) => (row.text === null ? [] : [row.text]));
  }

  // --------------------------------------------------------------------------
  // Contacts
  // --------------------------------------------------------------------------

  /**
   * True when a stored contact for the card has the same name and location and
   * shares at least one phone number in the same category.
   */
  hasMatchingContact(cardId: string, candidate: ContactFieldsV2): boolean {
    const row = this.db
      .prepare<[string, string, string, string | null, string | null, string | null], { found: number }>(`
        SELECT 1 AS found FROM contacts
        WHERE card_id = ? AND name = ? AND location = ?
          AND (mobile = ? OR landline = ? OR business = ?)
        LIMIT 1
      `)
      .get(cardId, candidate.name, candidate.location, candidate.mobile, candidate.landline, candidate.business);
    return row !== undefined;
  }

  /**
   * Insert all contacts for a card, or none of them.
   * @throws StoreError after rolling the batch back
   */
  commitContacts(cardId: string, contacts: ContactFieldsV2[]): number {
    if (contacts.length === 0) return 0;

    try {
      const insert = this.db.prepare(`
        INSERT INTO contacts (card_id, name, location, mobile, landline, business)
        VALUES (?, ?, ?, ?, ?, ?)
      `);
      const insertAll = this.db.transaction((batch: ContactFieldsV2[]) => {
        for (const contact of batch) {
          insert.run(cardId, contact.name, contact.location, contact.mobile, contact.landline, contact.business);
        }
        return batch.length;
      });
      return insertAll(contacts);
    } catch (error) {
      throw new StoreError(
        `Contact batch for card ${cardId} rolled back: ${errorMessage(error)}`,
        cardId,
        { cause: error }
      );
    }
  }

  listContacts(filter: { boardId?: string; cardId?: string } = {}): ContactListing[] {
    const where: string[] = [];
    const params: string[] = [];
    if (filter.boardId) {
      where.push('cards.board_id = ?');
      params.push(filter.boardId);
    }
    if (filter.cardId) {
      where.push('contacts.card_id = ?');
      params.push(filter.cardId);
    }

    const sql = `
      SELECT contacts.*, cards.name AS card_name, cards.board_id AS board_id
      FROM contacts
      LEFT JOIN cards ON cards.id = contacts.card_id
      ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
      ORDER BY contacts.id
    `;

    return this.db
      .prepare<string[], ContactListingRow>(sql)
      .all(...params)
      .map((row) => ({ ...toContact(row), cardName: row.card_name, boardId: row.board_id }));
  }

  // --------------------------------------------------------------------------
  // Maintenance
  // --------------------------------------------------------------------------

  /**
   * Clear all four tables in one transaction.
   */
  truncate(): void {
    const clear = this.db.transaction(() => {
      this.db.exec(`
        DELETE FROM lists;
        DELETE FROM cards;
        DELETE FROM comments;
        DELETE FROM contacts;
      `);
    });
    clear();
  }

  counts(): StoreCounts {
    const count = (table: string): number =>
      this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? 0;

    return {
      lists: count('lists'),
      cards: count('cards'),
      comments: count('comments'),
      contacts: count('contacts'),
    };
  }
}
