/**
 * Sync Command
 *
 * `cardscan sync [board]` mirrors a board into the local store and extracts
 * contacts. Without a board argument it lists boards and asks for one.
 */

import type { Command } from 'commander';

import type { Board } from '../../core/types.js';
import type { SyncRuntime } from '../helpers.js';
import { c } from '../colors.js';

interface SyncCommandOptions {
  dataDir?: string;
  concurrency: string;
  retries: string;
  json?: boolean;
}

function parseCount(name: string, value: string, min: number): number {
  const n = parseInt(value, 10);
  if (!Number.isInteger(n) || n < min) {
    console.error(`--${name} must be an integer >= ${min}, got "${value}"`);
    process.exit(1);
  }
  return n;
}

export function registerSyncCommand(program: Command): void {
  program
    .command('sync')
    .description('Synchronize a board and extract contacts from its cards')
    .argument('[board]', 'Board id, name, or number from `cardscan boards`')
    .option('-d, --data-dir <dir>', 'Data directory (default: CARDSCAN_DATA_DIR or ./data)')
    .option('-c, --concurrency <n>', 'Cards processed at the same time', '1')
    .option('-r, --retries <n>', 'Retries for transient extraction failures', '0')
    .option('--json', 'Print the sync report as JSON')
    .action(async (boardArg: string | undefined, options: SyncCommandOptions) => {
      const { loadConfig } = await import('../../core/config.js');
      const { ConfigError, errorMessage } = await import('../../core/errors.js');
      const { createSyncRuntime, formatBoardList, promptForBoard, renderProgress, formatReport } = await import('../helpers.js');
      const { synchronize } = await import('../../sync/index.js');

      const cardConcurrency = parseCount('concurrency', options.concurrency, 1);
      const retries = parseCount('retries', options.retries, 0);

      let runtime: SyncRuntime;
      try {
        const config = await loadConfig();
        runtime = createSyncRuntime(config, { dataDir: options.dataDir ?? config.dataDir, retries });
      } catch (error) {
        if (error instanceof ConfigError) {
          console.error(c.error('Config') + ' ' + error.message);
          process.exit(1);
        }
        throw error;
      }

      try {
        let boardRef = boardArg;
        let allowIndex = false;

        if (!boardRef) {
          console.log('\nFetching boards...\n');
          let boards: Board[];
          try {
            boards = await runtime.boards.listBoards();
          } catch (error) {
            runtime.logger.log('ERROR', `Error listing boards: ${errorMessage(error)}`);
            console.error('\nFailed to fetch boards. Please check your API keys and try again.');
            process.exitCode = 1;
            return;
          }

          for (const line of formatBoardList(boards)) console.log(line);
          console.log('');

          const answer = await promptForBoard();
          if (!answer) {
            console.log('Exiting.');
            return;
          }
          boardRef = answer;
          allowIndex = true;
        }

        const previousBoardId = await runtime.marker.read();

        const report = await synchronize(
          boardRef,
          {
            previousBoardId,
            allowIndex,
            cardConcurrency,
            onProgress: options.json ? undefined : renderProgress,
            onPhase: (phase, current) => {
              if (options.json || !current.board) return;
              if (phase === 'truncating') {
                console.log(`\nNew board selected: ${current.board.name}. Truncating database.`);
              } else if (phase === 'syncing' && current.mode === 'incremental') {
                console.log(`\nUsing last stored board: ${current.board.name}`);
              }
            },
          },
          runtime
        );

        if (options.json) {
          console.log(JSON.stringify(report, null, 2));
        } else {
          console.log('');
          const [headline, ...details] = formatReport(report);
          console.log(report.status === 'completed' ? c.success(headline ?? '') : c.warning(headline ?? ''));
          for (const line of details) console.log(`  ${line}`);
          console.log(`\n  ${c.dim('Run log:')} ${c.path(runtime.logger.filePath)}\n`);
        }

        if (report.status === 'aborted') {
          process.exitCode = 1;
        }
      } finally {
        runtime.store.close();
      }
    });
}
