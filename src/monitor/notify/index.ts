// src/monitor/notify/index.ts
export * from './desktop';
export * from './events';
export * from './sink';
export * from './types';
