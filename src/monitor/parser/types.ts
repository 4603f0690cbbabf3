// src/monitor/parser/types.ts
import type { LogRecord } from '@/monitor/source';
import type { EngineKind, WorkflowOutcome, WorkUnit } from '@/monitor/types';

export type ParseResult = {
  /** Distinct units in first-seen order. */
  units: WorkUnit[];
  /** Lines that moved a unit into a terminal state, in log order. */
  activity: string[];
  /** Expected unit count when the engine announces one. */
  declaredTotal?: number;
  /** Ids replaced by finer-grained rows (an array master once its tasks show); dropped from the model. */
  superseded?: string[];
  outcome: WorkflowOutcome;
};

/**
 * Derives the full unit set from the full source content. Implementations
 * are pure: the same records always yield the same result, so re-reading a
 * growing log every tick never double-counts.
 */
export type EventParser = {
  readonly engine: EngineKind;
  parse(records: readonly LogRecord[]): ParseResult;
};
