/**
 * cardscan - Board Synchronization
 *
 * Mirrors one board into the local store and runs the contact scan over every
 * card:
 *
 *   resolve board → plan (full | incremental) → [truncate + write marker]
 *     → per list: insert-if-absent
 *       → per card: insert card + comments, scan for contacts, commit batch
 *
 * A failing card is logged and skipped. A failing resolution or hierarchy walk
 * aborts the run; rows written before the failure stay, and a rerun fills in
 * whatever is missing.
 */

import type { Board, BoardList, Card } from '../core/types.js';
import type { BoardService } from '../core/trello-client.js';
import type { ContactStore } from '../core/store.js';
import type { BoardMarker } from '../core/marker.js';
import type { RunLogger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import { planSync, type SyncMode, type SyncPhase } from './plan.js';
import { resolveBoard } from './resolve.js';
import {
  scanCardForContacts,
  emptyContactCounters,
  addContactCounters,
  type ContactCounters,
  type ContactExtraction,
} from './scan.js';

// ============================================================================
// Types
// ============================================================================

export type SyncStore = Pick<
  ContactStore,
  | 'insertListIfAbsent'
  | 'insertCardIfAbsent'
  | 'insertCommentIfAbsent'
  | 'getCommentTexts'
  | 'hasMatchingContact'
  | 'commitContacts'
  | 'truncate'
>;

export interface SyncDependencies {
  boards: BoardService;
  store: SyncStore;
  extractor: ContactExtraction;
  marker: Pick<BoardMarker, 'write'>;
  logger: RunLogger;
}

export type SyncProgress =
  | { type: 'list'; list: BoardList; index: number; total: number; cardCount: number }
  | { type: 'card'; list: BoardList; card: Card; completed: number; total: number; failed: boolean };

export interface SyncOptions {
  /** Board id from the last run's marker, read once by the caller. */
  previousBoardId: string | null;
  /** Accept a 1-based index into the board list as the board reference. */
  allowIndex?: boolean;
  /** Cards of one list processed at the same time. Defaults to 1. */
  cardConcurrency?: number;
  onProgress?: (event: SyncProgress) => void;
  /** Called on every phase change, with the report as it stands. */
  onPhase?: (phase: SyncPhase, report: Readonly<SyncReport>) => void;
}

export interface CardError {
  boardId: string;
  listId: string;
  cardId: string;
  error: string;
}

export type AbortStage = 'resolve' | 'truncate' | 'walk';

export interface SyncReport {
  status: 'completed' | 'aborted';
  phase: SyncPhase;
  mode: SyncMode | null;
  board: Board | null;
  abort: { stage: AbortStage; error: string } | null;
  lists: { seen: number; inserted: number };
  cards: { seen: number; inserted: number; failed: number };
  comments: { seen: number; inserted: number };
  contacts: ContactCounters;
  cardErrors: CardError[];
  durationMs: number;
}

function emptyReport(): SyncReport {
  return {
    status: 'completed',
    phase: 'idle',
    mode: null,
    board: null,
    abort: null,
    lists: { seen: 0, inserted: 0 },
    cards: { seen: 0, inserted: 0, failed: 0 },
    comments: { seen: 0, inserted: 0 },
    contacts: emptyContactCounters(),
    cardErrors: [],
    durationMs: 0,
  };
}

// ============================================================================
// Card Processing
// ============================================================================

async function syncCard(
  board: Board,
  list: BoardList,
  remoteCard: Card,
  deps: SyncDependencies,
  report: SyncReport
): Promise<void> {
  const { boards, store } = deps;
  const card: Card = { ...remoteCard, listId: list.id, boardId: board.id };

  if (store.insertCardIfAbsent(card)) report.cards.inserted++;

  const comments = await boards.getComments(card.id);
  for (const comment of comments) {
    report.comments.seen++;
    if (store.insertCommentIfAbsent(comment)) report.comments.inserted++;
  }

  const counters = await scanCardForContacts(card, deps);
  addContactCounters(report.contacts, counters);
}

async function walkBoard(
  board: Board,
  options: SyncOptions,
  deps: SyncDependencies,
  report: SyncReport
): Promise<void> {
  const { boards, store, logger } = deps;
  const concurrency = Math.max(1, options.cardConcurrency ?? 1);

  const lists = await boards.getLists(board.id);

  for (const [listIndex, remoteList] of lists.entries()) {
    const list: BoardList = { ...remoteList, boardId: board.id };
    report.lists.seen++;
    if (store.insertListIfAbsent(list)) report.lists.inserted++;

    const cards = await boards.getCards(list.id);
    options.onProgress?.({
      type: 'list',
      list,
      index: listIndex + 1,
      total: lists.length,
      cardCount: cards.length,
    });

    let completed = 0;
    for (let i = 0; i < cards.length; i += concurrency) {
      const batch = cards.slice(i, i + concurrency);
      const results = await Promise.allSettled(batch.map((card) => syncCard(board, list, card, deps, report)));

      for (const [j, result] of results.entries()) {
        const card = batch[j];
        if (!card) continue;
        report.cards.seen++;
        completed++;

        const failed = result.status === 'rejected';
        if (result.status === 'rejected') {
          const message = errorMessage(result.reason);
          report.cards.failed++;
          report.cardErrors.push({ boardId: board.id, listId: list.id, cardId: card.id, error: message });
          logger.log('ERROR', `Failed to process card: ${board.id} -> ${list.id} -> ${card.id}: ${message}`);
        }

        options.onProgress?.({ type: 'card', list, card, completed, total: cards.length, failed });
      }
    }
  }
}

// ============================================================================
// Entry Point
// ============================================================================

export async function synchronize(
  boardRef: string,
  options: SyncOptions,
  deps: SyncDependencies
): Promise<SyncReport> {
  const startedAt = Date.now();
  const { store, marker, logger } = deps;
  const report = emptyReport();

  const enter = (phase: SyncPhase): void => {
    report.phase = phase;
    options.onPhase?.(phase, report);
  };

  const abort = (stage: AbortStage, error: string): SyncReport => {
    report.status = 'aborted';
    report.abort = { stage, error };
    report.durationMs = Date.now() - startedAt;
    enter('aborted');
    return report;
  };

  enter('resolving');
  let board: Board;
  try {
    board = await resolveBoard(deps.boards, boardRef, { allowIndex: options.allowIndex });
  } catch (error) {
    const message = errorMessage(error);
    logger.log('ERROR', `Error finding board "${boardRef}": ${message}`);
    return abort('resolve', message);
  }
  report.board = board;

  const mode = planSync(options.previousBoardId, board.id);
  report.mode = mode;

  if (mode === 'full') {
    enter('truncating');
    try {
      store.truncate();
      await marker.write(board.id);
    } catch (error) {
      const message = errorMessage(error);
      logger.log('ERROR', `Error resetting store for board ${board.name}: ${message}`);
      return abort('truncate', message);
    }
  }

  enter('syncing');
  try {
    await walkBoard(board, options, deps, report);
  } catch (error) {
    const message = errorMessage(error);
    logger.log('ERROR', `Error scraping board ${board.name}: ${message}`);
    return abort('walk', message);
  }

  report.durationMs = Date.now() - startedAt;
  enter('idle');
  return report;
}
