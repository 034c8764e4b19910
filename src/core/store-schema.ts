/**
 * Store - Schema & Migrations
 *
 * Numbered migrations tracked in SQLite's `user_version` pragma.
 *
 * 1. Board hierarchy tables and contacts with a single generic `phone` column
 * 2. Contacts split into `mobile` / `landline` / `business`; the generic phone
 *    is carried into `mobile`
 *
 * Databases written before versioning existed have `user_version = 0` but
 * already hold tables; their version is inferred from the contacts columns.
 */

import type Database from 'better-sqlite3';

import { CardscanError } from './errors.js';

export interface Migration {
  version: number;
  description: string;
  up(db: Database.Database): void;
}

export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    description: 'board hierarchy and single-phone contacts',
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS lists (
          id TEXT PRIMARY KEY,
          name TEXT,
          board_id TEXT
        );

        CREATE TABLE IF NOT EXISTS cards (
          id TEXT PRIMARY KEY,
          name TEXT,
          description TEXT,
          list_id TEXT,
          board_id TEXT
        );

        CREATE TABLE IF NOT EXISTS comments (
          id TEXT PRIMARY KEY,
          card_id TEXT,
          text TEXT
        );

        CREATE TABLE IF NOT EXISTS contacts (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          card_id TEXT NOT NULL,
          name TEXT NOT NULL,
          location TEXT NOT NULL,
          phone TEXT,
          UNIQUE (card_id, name, location, phone)
        );
      `);
    },
  },
  {
    version: 2,
    description: 'typed phone fields on contacts',
    up(db) {
      db.exec(`
        CREATE TABLE contacts_v2 (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          card_id TEXT NOT NULL,
          name TEXT NOT NULL,
          location TEXT NOT NULL,
          mobile TEXT,
          landline TEXT,
          business TEXT,
          UNIQUE (card_id, name, location, mobile, landline, business)
        );

        INSERT INTO contacts_v2 (id, card_id, name, location, mobile, landline, business)
          SELECT id, card_id, name, location, NULLIF(TRIM(phone), ''), NULL, NULL FROM contacts;

        DROP TABLE contacts;
        ALTER TABLE contacts_v2 RENAME TO contacts;

        CREATE INDEX IF NOT EXISTS idx_contacts_card ON contacts (card_id);
        CREATE INDEX IF NOT EXISTS idx_comments_card ON comments (card_id);
      `);
    },
  },
];

export const LATEST_SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1]?.version ?? 0;

export function readSchemaVersion(db: Database.Database): number {
  const version = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}

function tableColumns(db: Database.Database, table: string): string[] {
  return db
    .prepare<[], { name: string }>(`PRAGMA table_info(${table})`)
    .all()
    .map((column) => column.name);
}

/**
 * Infer the version of a database created before `user_version` was set.
 */
export function detectUnversionedSchema(db: Database.Database): number {
  const columns = tableColumns(db, 'contacts');
  if (columns.length === 0) return 0;
  if (columns.includes('mobile')) return 2;
  if (columns.includes('phone')) return 1;
  throw new CardscanError(`Unrecognized contacts table layout: ${columns.join(', ')}`);
}

export interface MigrationResult {
  from: number;
  to: number;
  applied: number[];
}

/**
 * Apply every pending migration up to `target`, each in its own transaction.
 */
export function migrate(db: Database.Database, target = LATEST_SCHEMA_VERSION): MigrationResult {
  let current = readSchemaVersion(db);
  if (current === 0) {
    current = detectUnversionedSchema(db);
    if (current > 0) {
      db.pragma(`user_version = ${current}`);
    }
  }

  if (current > LATEST_SCHEMA_VERSION) {
    throw new CardscanError(
      `Database schema v${current} is newer than this build supports (v${LATEST_SCHEMA_VERSION})`
    );
  }

  const from = current;
  const applied: number[] = [];

  for (const migration of MIGRATIONS) {
    if (migration.version <= current || migration.version > target) continue;

    const apply = db.transaction(() => {
      migration.up(db);
      db.pragma(`user_version = ${migration.version}`);
    });
    apply();

    applied.push(migration.version);
    current = migration.version;
  }

  return { from, to: current, applied };
}
