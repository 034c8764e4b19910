/**
 * Database Commands
 *
 * status: schema version, row counts and the last synchronized board
 * reset:  clear every table and forget the last board
 */

import type { Command } from 'commander';

import { c } from '../colors.js';

export function registerDbCommand(program: Command): void {
  const dbCmd = program
    .command('db')
    .description('Local database maintenance');

  dbCmd
    .command('status', { isDefault: true })
    .description('Show schema version, row counts and the last synchronized board')
    .option('-d, --data-dir <dir>', 'Data directory (default: CARDSCAN_DATA_DIR or ./data)')
    .action(async (options: { dataDir?: string }) => {
      const { loadConfig, getDataPaths } = await import('../../core/config.js');
      const { ContactStore } = await import('../../core/store.js');
      const { FileBoardMarker } = await import('../../core/marker.js');

      const config = await loadConfig();
      const paths = getDataPaths(options.dataDir ?? config.dataDir);
      const store = ContactStore.open(paths.dbPath);

      try {
        const counts = store.counts();
        const lastBoard = await new FileBoardMarker(paths.markerPath).read();
        const applied = store.migration.applied;

        console.log(`\n${c.title('cardscan database')}`);
        console.log(`  Path:        ${c.path(paths.dbPath)}`);
        console.log(`  Schema:      v${store.schemaVersion()}${applied.length > 0 ? c.dim(` (migrated: ${applied.map((v) => `v${v}`).join(', ')})`) : ''}`);
        console.log(`  Last board:  ${lastBoard ?? c.dim('(none)')}`);
        console.log(`  Lists:       ${counts.lists}`);
        console.log(`  Cards:       ${counts.cards}`);
        console.log(`  Comments:    ${counts.comments}`);
        console.log(`  Contacts:    ${counts.contacts}\n`);
      } finally {
        store.close();
      }
    });

  dbCmd
    .command('reset')
    .description('Delete all synchronized rows and forget the last board')
    .option('-d, --data-dir <dir>', 'Data directory (default: CARDSCAN_DATA_DIR or ./data)')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (options: { dataDir?: string; yes?: boolean }) => {
      const { loadConfig, getDataPaths } = await import('../../core/config.js');
      const { ContactStore } = await import('../../core/store.js');
      const { FileBoardMarker } = await import('../../core/marker.js');

      if (!options.yes) {
        const readline = await import('readline');
        const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
        const answer = await new Promise<string>((resolve) => {
          rl.question('This deletes every list, card, comment and contact. Continue? [y/N] ', resolve);
        });
        rl.close();
        if (answer.trim().toLowerCase() !== 'y') {
          console.log('Cancelled.');
          return;
        }
      }

      const config = await loadConfig();
      const paths = getDataPaths(options.dataDir ?? config.dataDir);
      const store = ContactStore.open(paths.dbPath);
      try {
        store.truncate();
        await new FileBoardMarker(paths.markerPath).clear();
        console.log(c.success('✓ Database cleared'));
      } finally {
        store.close();
      }
    });
}
