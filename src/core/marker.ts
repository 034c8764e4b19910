/**
 * Last-synchronized board marker
 *
 * A single board id in <dataDir>/last_board.txt. The CLI reads it once per run
 * and hands the value to the orchestrator; the orchestrator writes it back only
 * when a different board is selected.
 */

import { readFile, writeFile, mkdir, rm } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';

export interface BoardMarker {
  read(): Promise<string | null>;
  write(boardId: string): Promise<void>;
  clear(): Promise<void>;
}

export class FileBoardMarker implements BoardMarker {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async read(): Promise<string | null> {
    if (!existsSync(this.filePath)) return null;
    const value = (await readFile(this.filePath, 'utf-8')).trim();
    return value === '' ? null : value;
  }

  async write(boardId: string): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, boardId);
  }

  async clear(): Promise<void> {
    await rm(this.filePath, { force: true });
  }
}
