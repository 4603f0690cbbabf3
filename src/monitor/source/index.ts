// src/monitor/source/index.ts
export { CommandSource, type CommandSourceOptions } from './command';
export { DirectorySource } from './directory';
export { TailSource } from './tail';
export type { LogRecord, LogSource } from './types';
export { splitLines, toRecords } from './types';
