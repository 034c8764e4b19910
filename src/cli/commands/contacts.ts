/**
 * Contacts Command
 *
 * Shows contacts extracted by previous syncs.
 */

import type { Command } from 'commander';

import type { ContactListing } from '../../core/store.js';
import { c } from '../colors.js';

interface ContactsCommandOptions {
  dataDir?: string;
  board?: string;
  card?: string;
  json?: boolean;
}

export function formatContact(contact: ContactListing): string {
  const phones = [
    contact.mobile ? `mobile ${contact.mobile}` : null,
    contact.landline ? `landline ${contact.landline}` : null,
    contact.business ? `business ${contact.business}` : null,
  ].filter((p): p is string => p !== null);

  return `${contact.name} | ${contact.location} | ${phones.join(', ')}`;
}

export function registerContactsCommand(program: Command): void {
  program
    .command('contacts')
    .description('List extracted contacts')
    .option('-d, --data-dir <dir>', 'Data directory (default: CARDSCAN_DATA_DIR or ./data)')
    .option('-b, --board <id>', 'Only contacts from cards on this board')
    .option('--card <id>', 'Only contacts from this card')
    .option('--json', 'Output as JSON')
    .action(async (options: ContactsCommandOptions) => {
      const { loadConfig, getDataPaths } = await import('../../core/config.js');
      const { ContactStore } = await import('../../core/store.js');

      const config = await loadConfig();
      const { dbPath } = getDataPaths(options.dataDir ?? config.dataDir);
      const store = ContactStore.open(dbPath);

      try {
        const contacts = store.listContacts({ boardId: options.board, cardId: options.card });

        if (options.json) {
          console.log(JSON.stringify(contacts, null, 2));
          return;
        }

        if (contacts.length === 0) {
          console.log('No contacts found. Run "cardscan sync" first.');
          return;
        }

        console.log(`\n${c.title(`Contacts (${contacts.length})`)}`);
        console.log('━'.repeat(50));

        let currentCard: string | null = null;
        for (const contact of contacts) {
          if (contact.cardId !== currentCard) {
            currentCard = contact.cardId;
            console.log(`\n${c.bold(contact.cardName ?? contact.cardId)} ${c.dim(`(${contact.cardId})`)}`);
          }
          console.log(`  ${formatContact(contact)}`);
        }
        console.log('');
      } finally {
        store.close();
      }
    });
}
