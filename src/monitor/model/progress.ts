/* src/monitor/model/progress.ts
 * Aggregate unit state across ticks.
 *
 * The model is an immutable value: every tick derives the unit set from the
 * whole log and `apply` returns a new model plus the transitions it saw.
 * Prior terminal units stay terminal even if a later read regresses.
 */
import { advance, type ParseResult } from '@/monitor/parser';
import {
  isTerminal,
  type ProgressSnapshot,
  type StateCounts,
  type UnitState,
  type WorkflowOutcome,
  type WorkUnit,
} from '@/monitor/types';

export type UnitTransition = {
  unit: WorkUnit;
  from: UnitState | undefined;
  to: UnitState;
};

export const computeSnapshot = (
  units: readonly WorkUnit[],
  opts: { startedAt: number; now: number; declaredTotal?: number },
): ProgressSnapshot => {
  const counts: StateCounts = { pending: 0, running: 0, completed: 0, failed: 0 };
  let cached = 0;
  for (const u of units) {
    counts[u.state] += 1;
    if (u.cached && u.state === 'completed') cached += 1;
  }
  const total = Math.max(units.length, opts.declaredTotal ?? 0);
  // Announced but not yet seen.
  counts.pending += total - units.length;

  const elapsedSec = Math.max(0, Math.floor((opts.now - opts.startedAt) / 1000));
  const percent = total === 0 ? 0 : Math.floor((counts.completed * 100) / total);
  const etaSec =
    counts.completed > 0
      ? Math.floor((elapsedSec * (total - counts.completed)) / counts.completed)
      : null;
  return {
    total,
    counts,
    cached,
    percent,
    elapsedSec,
    etaSec,
    at: opts.now,
  };
};

export class ProgressModel {
  private constructor(
    readonly startedAt: number,
    private readonly byId: ReadonlyMap<string, WorkUnit>,
    readonly outcome: WorkflowOutcome,
    readonly declaredTotal: number | undefined,
  ) {}

  static start(now: number): ProgressModel {
    return new ProgressModel(now, new Map(), 'running', undefined);
  }

  get units(): WorkUnit[] {
    return Array.from(this.byId.values());
  }

  apply(
    result: ParseResult,
    now: number,
  ): { model: ProgressModel; transitions: UnitTransition[] } {
    const next = new Map(this.byId);
    for (const id of result.superseded ?? []) next.delete(id);
    const transitions: UnitTransition[] = [];
    for (const u of result.units) {
      const prior = this.byId.get(u.id);
      const state = advance(prior?.state, u.state);
      const unit: WorkUnit = { id: u.id, label: u.label, state };
      if (u.cached || prior?.cached) unit.cached = true;
      const startedAt = prior?.startedAt ?? (state === 'pending' ? undefined : now);
      if (startedAt !== undefined) unit.startedAt = startedAt;
      const endedAt = prior?.endedAt ?? (isTerminal(state) ? now : undefined);
      if (endedAt !== undefined) unit.endedAt = endedAt;
      next.set(u.id, unit);
      if (prior?.state !== state) {
        transitions.push({ unit, from: prior?.state, to: state });
      }
    }
    const outcome = this.outcome === 'running' ? result.outcome : this.outcome;
    const model = new ProgressModel(
      this.startedAt,
      next,
      outcome,
      result.declaredTotal ?? this.declaredTotal,
    );
    return { model, transitions };
  }

  snapshot(now: number): ProgressSnapshot {
    const opts: { startedAt: number; now: number; declaredTotal?: number } = {
      startedAt: this.startedAt,
      now,
    };
    if (this.declaredTotal !== undefined) opts.declaredTotal = this.declaredTotal;
    return computeSnapshot(this.units, opts);
  }
}
