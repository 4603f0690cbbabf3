// src/monitor/source/directory.ts
import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';

import fg from 'fast-glob';

import { errnoCode, SourceUnavailableError } from '@/monitor/errors';

import { describeFsError } from './tail';
import { type LogRecord, type LogSource, toRecords } from './types';

/**
 * Every file matching `pattern` under a directory, each as its own origin
 * (Cromwell writes one log per workflow). A plain file path is read as a
 * single origin.
 */
export class DirectorySource implements LogSource {
  constructor(
    readonly id: string,
    private readonly pattern = '*.log',
  ) {}

  async read(): Promise<LogRecord[]> {
    let isDir: boolean;
    try {
      isDir = (await stat(this.id)).isDirectory();
    } catch (e) {
      throw new SourceUnavailableError(
        this.id,
        errnoCode(e) === 'ENOENT'
          ? 'log directory not found'
          : describeFsError(e),
        { cause: e },
      );
    }
    const files = isDir
      ? (
          await fg(this.pattern, {
            cwd: this.id,
            absolute: true,
            onlyFiles: true,
          })
        ).sort()
      : [path.resolve(this.id)];

    const out: LogRecord[] = [];
    for (const file of files) {
      let text: string;
      try {
        text = await readFile(file, 'utf8');
      } catch (e) {
        // A log rotated or removed between listing and reading is skipped.
        if (errnoCode(e) === 'ENOENT') continue;
        throw new SourceUnavailableError(this.id, describeFsError(e), {
          cause: e,
        });
      }
      const records = toRecords(file, text);
      // Empty files still announce a workflow.
      out.push(...(records.length > 0 ? records : [{ origin: file, text: '' }]));
    }
    return out;
  }
}
