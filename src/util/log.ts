// src/util/log.ts
import { error, warn } from './color';

export type Log = {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

/** Console logger with the `wfmon:` prefix; warnings and errors go to stderr. */
export const consoleLog: Log = {
  info(message) {
    console.log(`wfmon: ${message}`);
  },
  warn(message) {
    console.error(`wfmon: ${warn('warning:')} ${message}`);
  },
  error(message) {
    console.error(`wfmon: ${error('error:')} ${message}`);
  },
};
