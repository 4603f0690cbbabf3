// src/monitor/source/tail.ts
import { readFile } from 'node:fs/promises';

import { errnoCode, SourceUnavailableError } from '@/monitor/errors';

import { type LogRecord, type LogSource, toRecords } from './types';

export const describeFsError = (e: unknown): string => {
  switch (errnoCode(e)) {
    case 'ENOENT':
      return 'log file not found';
    case 'EACCES':
    case 'EPERM':
      return 'cannot read log file (check permissions)';
    case 'EISDIR':
      return 'expected a file, found a directory';
    default:
      return e instanceof Error ? e.message : String(e);
  }
};

/** Re-reads the whole log file on every poll; no byte offset is tracked. */
export class TailSource implements LogSource {
  constructor(readonly id: string) {}

  async read(): Promise<LogRecord[]> {
    try {
      return toRecords(this.id, await readFile(this.id, 'utf8'));
    } catch (e) {
      throw new SourceUnavailableError(this.id, describeFsError(e), {
        cause: e,
      });
    }
  }
}
