// src/monitor/model/index.ts
export * from './progress';
