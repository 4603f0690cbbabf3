// src/monitor/source/types.ts

/** One raw line plus where it came from (file path or command label). */
export type LogRecord = { origin: string; text: string };

/**
 * A place progress events come from. `read()` returns the full current
 * content on every call; it throws SourceUnavailableError when the file or
 * command cannot be reached.
 */
export type LogSource = {
  /** Log path, directory or job selector; shown on the dashboard and persisted. */
  readonly id: string;
  read(): Promise<LogRecord[]>;
};

export const splitLines = (text: string): string[] => {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines;
};

export const toRecords = (origin: string, text: string): LogRecord[] =>
  splitLines(text).map((line) => ({ origin, text: line }));
