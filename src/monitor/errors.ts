/* src/monitor/errors.ts
 * Error taxonomy for the monitor. Unmatched log lines are ignored, never raised.
 */

/** A log file is missing/unreadable or a status command could not be started. */
export class SourceUnavailableError extends Error {
  readonly sourceId: string;

  constructor(sourceId: string, reason: string, options?: { cause?: unknown }) {
    super(`${sourceId}: ${reason}`, options);
    this.name = 'SourceUnavailableError';
    this.sourceId = sourceId;
  }
}

/** Bad arguments, environment or config file. Maps to exit code 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** The source never became reachable within the startup retry budget. Exit code 2. */
export class StartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StartupError';
  }
}

export const errorMessage = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);

/** Node system error code (ENOENT, EACCES, ...) when present. */
export const errnoCode = (e: unknown): string | undefined =>
  e instanceof Error && 'code' in e && typeof e.code === 'string'
    ? e.code
    : undefined;
