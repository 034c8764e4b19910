/**
 * Boards Command
 *
 * Lists the member's open boards, numbered the way `cardscan sync` accepts them.
 */

import type { Command } from 'commander';

import type { BoardService } from '../../core/trello-client.js';
import { c } from '../colors.js';

export function registerBoardsCommand(program: Command): void {
  program
    .command('boards')
    .description('List open Trello boards')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      const { loadConfig, requireTrelloCredentials } = await import('../../core/config.js');
      const { TrelloClient } = await import('../../core/trello-client.js');
      const { ConfigError, errorMessage } = await import('../../core/errors.js');
      const { formatBoardList } = await import('../helpers.js');

      let client: BoardService;
      try {
        const credentials = requireTrelloCredentials(await loadConfig());
        client = new TrelloClient({ apiKey: credentials.trelloApiKey, apiToken: credentials.trelloApiToken });
      } catch (error) {
        if (error instanceof ConfigError) {
          console.error(c.error('Config') + ' ' + error.message);
          process.exit(1);
        }
        throw error;
      }

      try {
        const boards = await client.listBoards();
        if (options.json) {
          console.log(JSON.stringify(boards, null, 2));
          return;
        }

        console.log(`\n${c.title(`Boards (${boards.length})`)}`);
        console.log('━'.repeat(50));
        for (const line of formatBoardList(boards)) console.log(line);
        console.log('');
      } catch (error) {
        console.error(`\nFailed to fetch boards: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
