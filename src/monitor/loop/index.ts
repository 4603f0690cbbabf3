// src/monitor/loop/index.ts
export * from './monitor-loop';
export * from './signals';
export * from './sleep';
export * from './tick';
