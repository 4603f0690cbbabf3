// src/monitor/parser/slurm.ts
import type { LogRecord } from '@/monitor/source';
import { isTerminal, type UnitState, type WorkUnit } from '@/monitor/types';

import { type Grammar, type GrammarRule, parseWithGrammar } from './grammar';
import type { EventParser } from './types';

/** Field list for `sacct -n -P -X -o ...`. */
export const SACCT_FORMAT = 'JobID,JobName,State,Elapsed';

const STATES: Record<UnitState, readonly string[]> = {
  pending: ['PENDING', 'REQUEUED', 'SUSPENDED', 'RESIZING', 'REQUEUE_HOLD'],
  running: ['RUNNING', 'COMPLETING', 'CONFIGURING', 'STAGE_OUT', 'SIGNALING'],
  completed: ['COMPLETED'],
  failed: [
    'FAILED',
    'CANCELLED',
    'TIMEOUT',
    'OUT_OF_MEMORY',
    'NODE_FAIL',
    'PREEMPTED',
    'BOOT_FAIL',
    'DEADLINE',
  ],
};

const row = (state: UnitState): RegExp =>
  new RegExp(
    String.raw`^(?<id>[^|\s]+?)(?:_\[[^|]*\])?\|(?<label>[^|]*)\|(?<state>${STATES[state].join('|')})\b[^|]*(?:\|(?<elapsed>[^|]*))?`,
  );

const describeRow = (m: RegExpExecArray, unit: WorkUnit): string => {
  const g = m.groups ?? {};
  const name = unit.label !== unit.id ? ` (${unit.label})` : '';
  const elapsed = g.elapsed ? ` after ${g.elapsed}` : '';
  return `job ${unit.id}${name} ${g.state ?? ''}${elapsed}`;
};

export const SLURM_RULES: readonly GrammarRule[] = (
  ['pending', 'running', 'completed', 'failed'] as const
).map(
  (state): GrammarRule => ({
    name: state,
    pattern: row(state),
    effect: { kind: 'unit', state },
    activity: describeRow,
  }),
);

/** Rows that belong to a job: the job itself or its array tasks. */
const membersOf = (units: readonly WorkUnit[], id: string): WorkUnit[] =>
  units.filter((u) => u.id === id || u.id.startsWith(`${id}_`));

/** Array jobs with at least one task row (`103` for `103_1`). */
const arrayMasters = (units: readonly WorkUnit[]): string[] => {
  const out = new Set<string>();
  for (const u of units) {
    const master = /^(.+)_\d+$/.exec(u.id)?.[1];
    if (master) out.add(master);
  }
  return Array.from(out);
};

/**
 * A pending array shows as one `103_[1-4]` row; it is read as job `103`
 * until task rows (`103_1`, ...) replace it.
 *
 * `expect`: job ids requested explicitly. They are seeded as pending and the
 * workflow completes once every one of them (or all its array tasks) is
 * terminal. Without it (user mode) there is no completion marker.
 */
export const createSlurmParser = (
  opts: { expect?: readonly string[] } = {},
): EventParser => {
  const expect = opts.expect ?? [];
  const grammar: Grammar = {
    rules: SLURM_RULES,
    seed: expect.map((id) => ({ id, label: id, state: 'pending' })),
  };
  return {
    engine: 'slurm',
    parse: (records: readonly LogRecord[]) => {
      const result = parseWithGrammar(grammar, records);
      // Task rows stand in for their array master from then on.
      const masters = arrayMasters(result.units);
      if (masters.length > 0) {
        result.units = result.units.filter((u) => !masters.includes(u.id));
        result.superseded = masters;
      }
      if (expect.length > 0) {
        const groups = expect.map((id) => membersOf(result.units, id));
        const done = groups.every(
          (g) => g.length > 0 && g.every((u) => isTerminal(u.state)),
        );
        if (done) {
          result.outcome = groups.some((g) => g.some((u) => u.state === 'failed'))
            ? 'failed'
            : 'succeeded';
        }
      }
      return result;
    },
  };
};
