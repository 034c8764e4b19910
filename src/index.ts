#!/usr/bin/env node

/**
 * cardscan CLI
 *
 * Commands:
 * - boards: List open Trello boards
 * - sync: Mirror a board into SQLite and extract contacts from its cards
 * - contacts: List extracted contacts
 * - db: Schema/row status and reset
 * - config: View or change saved settings
 */

// Load environment variables from .env files
// .env.local takes precedence over .env
import { existsSync, readFileSync } from 'fs';
import { parse } from 'dotenv';

function loadEnvFile(filePath: string, override = false): void {
  if (!existsSync(filePath)) return;
  const parsed = parse(readFileSync(filePath, 'utf-8'));
  for (const [key, value] of Object.entries(parsed)) {
    if (override || process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

loadEnvFile('.env');
loadEnvFile('.env.local', true);

import { Command } from 'commander';

import { registerBoardsCommand } from './cli/commands/boards.js';
import { registerSyncCommand } from './cli/commands/sync.js';
import { registerContactsCommand } from './cli/commands/contacts.js';
import { registerDbCommand } from './cli/commands/db.js';
import { registerConfigCommand } from './cli/commands/config.js';

const program = new Command();

program
  .name('cardscan')
  .description('Sync Trello boards into SQLite and extract contact records from card text')
  .version('0.1.0');

registerBoardsCommand(program);
registerSyncCommand(program);
registerContactsCommand(program);
registerDbCommand(program);
registerConfigCommand(program);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
