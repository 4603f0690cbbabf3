// src/monitor/types.ts
export type EngineKind = 'snakemake' | 'nextflow' | 'wdl' | 'slurm';

export const ENGINE_KINDS: readonly EngineKind[] = [
  'snakemake',
  'nextflow',
  'wdl',
  'slurm',
];

export const isEngineKind = (v: string): v is EngineKind =>
  (ENGINE_KINDS as readonly string[]).includes(v);

export type UnitState = 'pending' | 'running' | 'completed' | 'failed';

export const isTerminal = (s: UnitState): boolean =>
  s === 'completed' || s === 'failed';

/** One schedulable item: a rule instance, a process invocation, a scheduler job. */
export type WorkUnit = {
  id: string;
  label: string;
  state: UnitState;
  /** Served from cache rather than executed (Nextflow). */
  cached?: boolean;
  /** Monitor clock (epoch ms) when the unit was first seen running or terminal. */
  startedAt?: number;
  /** Monitor clock (epoch ms) when the unit was first seen terminal. */
  endedAt?: number;
};

export type StateCounts = Record<UnitState, number>;

/** Engine-level verdict derived from the log, independent of per-unit counts. */
export type WorkflowOutcome = 'running' | 'succeeded' | 'failed';

export type ProgressSnapshot = {
  readonly total: number;
  readonly counts: Readonly<StateCounts>;
  /** Subset of completed that came from cache. */
  readonly cached: number;
  /** completed * 100 / total, floored; 0 when total is 0. */
  readonly percent: number;
  readonly elapsedSec: number;
  /** null means unknown (nothing completed yet). */
  readonly etaSec: number | null;
  /** Epoch ms of computation. */
  readonly at: number;
};

export type NotificationUrgency = 'low' | 'normal' | 'critical';

export type NotificationEvent = {
  /** Dedup key; one delivery per key per monitor lifetime. */
  key: string;
  title: string;
  message: string;
  urgency: NotificationUrgency;
};

export type ResourceSample = {
  pid: number;
  cpuPercent: number;
  rssBytes: number;
};
