/**
 * CLI Helper Functions
 *
 * Shared wiring and output formatting for CLI commands.
 */

import type { Board } from '../core/types.js';
import type { ResolvedConfig } from '../core/config.js';
import { getDataPaths, requireCredentials, type DataPaths } from '../core/config.js';
import { TrelloClient } from '../core/trello-client.js';
import { ContactStore } from '../core/store.js';
import { FileBoardMarker } from '../core/marker.js';
import { FileRunLogger } from '../core/logger.js';
import { ContactExtractor } from '../core/contact-extractor.js';
import { createCompletionClient } from '../core/llm-client.js';
import type { SyncDependencies, SyncProgress, SyncReport } from '../sync/index.js';
import { c } from './colors.js';

export interface SyncRuntime extends SyncDependencies {
  boards: TrelloClient;
  store: ContactStore;
  marker: FileBoardMarker;
  logger: FileRunLogger;
  paths: DataPaths;
}

/**
 * Build every collaborator a sync needs from resolved config.
 * Truncates the run log.
 */
export function createSyncRuntime(
  config: ResolvedConfig,
  options: { dataDir: string; retries?: number }
): SyncRuntime {
  const credentials = requireCredentials(config);
  const paths = getDataPaths(options.dataDir);

  const extractor = new ContactExtractor(createCompletionClient(config.provider, credentials.providerApiKey), {
    model: config.model,
    maxTokens: config.maxTokens,
    phoneRegion: config.phoneRegion,
    maxRetries: options.retries ?? 0,
  });

  return {
    boards: new TrelloClient({ apiKey: credentials.trelloApiKey, apiToken: credentials.trelloApiToken }),
    store: ContactStore.open(paths.dbPath),
    extractor,
    marker: new FileBoardMarker(paths.markerPath),
    logger: new FileRunLogger(paths.errorLogPath),
    paths,
  };
}

export function formatBoardList(boards: readonly Board[]): string[] {
  return boards.map((board, index) => `${index + 1}. Board Name: ${board.name}`);
}

/**
 * Ask for a board number, name or id. Resolves to null on empty input.
 */
export async function promptForBoard(): Promise<string | null> {
  const readline = await import('readline');
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const answer = await new Promise<string>((resolve) => {
    rl.question('Enter the number of the board you want to scrape, or press Enter to exit: ', (input) => {
      resolve(input.trim());
    });
  });
  rl.close();

  return answer === '' ? null : answer;
}

export function renderProgress(event: SyncProgress): void {
  if (event.type === 'list') {
    console.log(`\n${c.bold(`List ${event.index}/${event.total}:`)} ${event.list.name} ${c.dim(`(${event.cardCount} cards)`)}`);
    return;
  }

  const width = 30;
  const filled = event.total === 0 ? width : Math.round((event.completed / event.total) * width);
  const bar = '='.repeat(filled).padEnd(width, ' ');
  const pct = event.total === 0 ? 100 : Math.round((event.completed / event.total) * 100);
  process.stdout.write(`\r  |${bar}| ${String(pct).padStart(3)}%  [${event.completed}/${event.total}]`);
  if (event.completed === event.total) {
    process.stdout.write('\n');
  }
}

export function formatReport(report: SyncReport): string[] {
  const lines: string[] = [];
  const boardName = report.board?.name ?? '(unresolved)';

  if (report.status === 'aborted' && report.abort) {
    lines.push(`Sync aborted during ${report.abort.stage}: ${report.abort.error}`);
  } else {
    lines.push(`Scraping complete for board: ${boardName}`);
  }

  if (report.mode) {
    lines.push(`Mode: ${report.mode === 'full' ? 'full resync' : 'incremental update'}`);
  }
  lines.push(`Lists: ${report.lists.seen} seen, ${report.lists.inserted} new`);
  lines.push(`Cards: ${report.cards.seen} seen, ${report.cards.inserted} new, ${report.cards.failed} failed`);
  lines.push(`Comments: ${report.comments.seen} seen, ${report.comments.inserted} new`);

  const k = report.contacts;
  lines.push(
    `Contacts: ${k.committed} committed from ${k.textUnits} text units ` +
      `(${k.rejected} rejected, ${k.duplicates} duplicates, ${k.unparsable} unparsable, ` +
      `${k.failedCalls} failed calls, ${k.rolledBack} rolled back)`
  );
  lines.push(`Duration: ${(report.durationMs / 1000).toFixed(1)}s`);
  return lines;
}
