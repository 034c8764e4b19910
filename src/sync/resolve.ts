/**
 * Board resolution
 *
 * A board reference is an id, a name (case-insensitive) or, when the caller
 * showed a numbered list, a 1-based index into that list. Ids win over names,
 * names over indexes. Ids of boards outside the member's open boards are
 * looked up directly.
 */

import type { Board } from '../core/types.js';
import type { BoardService } from '../core/trello-client.js';
import { BoardNotFoundError } from '../core/errors.js';

export interface ResolveOptions {
  allowIndex?: boolean;
}

export function boardAtIndex(boards: readonly Board[], input: string): Board | null {
  if (!/^\d+$/.test(input.trim())) return null;
  const index = parseInt(input, 10) - 1;
  return boards[index] ?? null;
}

export async function resolveBoard(
  service: BoardService,
  boardRef: string,
  options: ResolveOptions = {}
): Promise<Board> {
  const ref = boardRef.trim();
  if (ref === '') {
    throw new BoardNotFoundError(boardRef);
  }

  const boards = await service.listBoards();

  const byId = boards.find((b) => b.id === ref);
  if (byId) return byId;

  const lowered = ref.toLowerCase();
  const byName = boards.find((b) => b.name.toLowerCase() === lowered);
  if (byName) return byName;

  if (options.allowIndex) {
    const byIndex = boardAtIndex(boards, ref);
    if (byIndex) return byIndex;
  }

  return service.getBoard(ref);
}
