/**
 * Sync planning
 *
 * Whether a run rebuilds the store or adds to it depends only on the board
 * synchronized last time and the board requested now.
 */

export type SyncMode = 'full' | 'incremental';

/**
 * idle → resolving → (truncating →) syncing → idle
 *                 ↘ aborted
 */
export type SyncPhase = 'idle' | 'resolving' | 'truncating' | 'syncing' | 'aborted';

export function planSync(previousBoardId: string | null, boardId: string): SyncMode {
  return previousBoardId === boardId ? 'incremental' : 'full';
}
