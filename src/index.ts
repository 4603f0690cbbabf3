/** Library entry point: the monitor pipeline without the CLI. */
export * from './monitor/engines';
export * from './monitor/errors';
export * from './monitor/format';
export * from './monitor/loop';
export * from './monitor/model';
export * from './monitor/notify';
export * from './monitor/parser';
export * from './monitor/process/exec';
export * from './monitor/process/resources';
export * from './monitor/process/watch';
export * from './monitor/render';
export * from './monitor/source';
export * from './monitor/state';
export * from './monitor/types';
export type { FileConfig } from './cli/config/schema';
export type { MonitorSettings } from './cli/config/load';
