/**
 * Run log
 *
 * One line per recoverable failure during a sync: board resolution, per-card
 * errors, unparsable extractions, rejected and duplicate contacts, rollbacks.
 * The file is truncated when a run starts.
 */

import { appendFileSync, mkdirSync, writeFileSync } from 'fs';
import path from 'path';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'SKIP';

export interface RunLogger {
  log(level: LogLevel, message: string): void;
}

export function formatLogLine(level: LogLevel, message: string, now: Date = new Date()): string {
  const timestamp = now.toISOString().replace('T', ' ').slice(0, 19);
  return `[${timestamp}] ${level.padEnd(5)} ${message}\n`;
}

export class FileRunLogger implements RunLogger {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
    mkdirSync(path.dirname(filePath), { recursive: true });
    writeFileSync(filePath, '');
  }

  log(level: LogLevel, message: string): void {
    appendFileSync(this.filePath, formatLogLine(level, message));
  }
}

/** Collects lines in memory instead of writing a file. */
export class MemoryRunLogger implements RunLogger {
  readonly entries: Array<{ level: LogLevel; message: string }> = [];

  log(level: LogLevel, message: string): void {
    this.entries.push({ level, message });
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message);
  }
}
