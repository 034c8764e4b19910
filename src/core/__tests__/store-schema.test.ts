/**
 * Tests for schema migrations
 *
 * Covers: fresh databases, the v1 → v2 contact upgrade, databases created
 * before versioning, and refusing a newer schema.
 */

import { describe, it, expect } from 'vitest';
import Database from 'better-sqlite3';
import { migrate, readSchemaVersion, detectUnversionedSchema, LATEST_SCHEMA_VERSION, MIGRATIONS } from '../store-schema.js';
import { ContactStore } from '../store.js';
import { CardscanError } from '../errors.js';

interface MigratedContactRow {
  card_id: string;
  name: string;
  mobile: string | null;
  landline: string | null;
  business: string | null;
}

function createV1Database(): Database.Database {
  const db = new Database(':memory:');
  const v1 = MIGRATIONS.find((m) => m.version === 1);
  if (!v1) throw new Error('migration 1 missing');
  v1.up(db);
  db.prepare('INSERT INTO contacts (card_id, name, location, phone) VALUES (?, ?, ?, ?)').run('card-1', 'Jane', 'Drouin VIC', '+61400000000');
  db.prepare('INSERT INTO contacts (card_id, name, location, phone) VALUES (?, ?, ?, ?)').run('card-2', 'John', 'Warragul VIC', '  ');
  return db;
}

describe('migrate', () => {
  it('builds a fresh database at the latest version', () => {
    const db = new Database(':memory:');
    const result = migrate(db);

    expect(result).toEqual({ from: 0, to: LATEST_SCHEMA_VERSION, applied: [1, 2] });
    expect(readSchemaVersion(db)).toBe(2);
    expect(detectUnversionedSchema(db)).toBe(2);
    db.close();
  });

  it('is a no-op on an up-to-date database', () => {
    const db = new Database(':memory:');
    migrate(db);
    expect(migrate(db)).toEqual({ from: 2, to: 2, applied: [] });
    db.close();
  });

  it('stops at the requested target', () => {
    const db = new Database(':memory:');
    expect(migrate(db, 1)).toEqual({ from: 0, to: 1, applied: [1] });
    expect(readSchemaVersion(db)).toBe(1);
    db.close();
  });

  it('carries the generic phone into mobile', () => {
    const db = createV1Database();
    db.pragma('user_version = 1');

    expect(migrate(db)).toEqual({ from: 1, to: 2, applied: [2] });

    const rows = db
      .prepare<[], MigratedContactRow>('SELECT card_id, name, mobile, landline, business FROM contacts ORDER BY id')
      .all();
    expect(rows).toEqual([
      { card_id: 'card-1', name: 'Jane', mobile: '+61400000000', landline: null, business: null },
      { card_id: 'card-2', name: 'John', mobile: null, landline: null, business: null },
    ]);
    db.close();
  });

  it('detects an unversioned single-phone database from its columns', () => {
    const db = createV1Database();
    expect(readSchemaVersion(db)).toBe(0);

    expect(migrate(db)).toEqual({ from: 1, to: 2, applied: [2] });
    expect(readSchemaVersion(db)).toBe(2);
    db.close();
  });

  it('refuses a database written by a newer build', () => {
    const db = new Database(':memory:');
    db.pragma(`user_version = ${LATEST_SCHEMA_VERSION + 1}`);
    expect(() => migrate(db)).toThrow(CardscanError);
    db.close();
  });

  it('rejects an unknown contacts layout', () => {
    const db = new Database(':memory:');
    db.exec('CREATE TABLE contacts (id INTEGER PRIMARY KEY, email TEXT)');
    expect(() => detectUnversionedSchema(db)).toThrow('Unrecognized contacts table layout: id, email');
    db.close();
  });
});

describe('ContactStore migration', () => {
  it('records what it applied when opened', () => {
    const store = ContactStore.open(':memory:');
    expect(store.migration.applied).toEqual([1, 2]);
    expect(store.schemaVersion()).toBe(2);
    store.close();
  });
});
