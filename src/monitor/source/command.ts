// src/monitor/source/command.ts
import { SourceUnavailableError } from '@/monitor/errors';
import {
  CommandSpawnError,
  runCommand,
  type RunCommand,
} from '@/monitor/process/exec';
import { debugTrace } from '@/util/debug';
import { DBG_SCOPE_SOURCE } from '@/util/debug-scopes';

import { type LogRecord, type LogSource, toRecords } from './types';

export type CommandSourceOptions = {
  /** Selector shown on the dashboard (e.g. "jobs 101,102"). */
  id: string;
  command: string;
  args: readonly string[];
  timeoutMs?: number;
  run?: RunCommand;
};

/**
 * Invokes a status command (e.g. a scheduler query) and captures stdout.
 * A non-zero exit or a timeout means "no data yet"; only a command that
 * cannot be started at all is unavailable.
 */
export class CommandSource implements LogSource {
  readonly id: string;
  private readonly run: RunCommand;

  constructor(private readonly opts: CommandSourceOptions) {
    this.id = opts.id;
    this.run = opts.run ?? runCommand;
  }

  async read(): Promise<LogRecord[]> {
    const { command, args, timeoutMs } = this.opts;
    try {
      const res = await this.run(command, args, { timeoutMs });
      if (res.timedOut || res.code !== 0) {
        debugTrace(
          DBG_SCOPE_SOURCE,
          `${command} ${res.timedOut ? 'timed out' : `exited ${String(res.code)}`}; no data this tick`,
        );
        return [];
      }
      return toRecords(command, res.stdout);
    } catch (e) {
      if (e instanceof CommandSpawnError) {
        throw new SourceUnavailableError(this.id, e.message, { cause: e });
      }
      throw e;
    }
  }
}
