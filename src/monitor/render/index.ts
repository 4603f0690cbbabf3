// src/monitor/render/index.ts
export * from './frame';
export * from './labels';
export * from './renderer';
