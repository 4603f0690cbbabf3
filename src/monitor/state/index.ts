// src/monitor/state/index.ts
export * from './control';
export * from './store';
