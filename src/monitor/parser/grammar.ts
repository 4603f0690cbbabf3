/* src/monitor/parser/grammar.ts
 * Ordered (pattern, effect) rules shared by every engine parser.
 *
 * Precedence is explicit: when several unit rules match one line the most
 * advanced state wins (failed > completed > running > pending), and a unit
 * that reached a terminal state never moves again. Workflow and total rules
 * always apply alongside.
 */
import type { LogRecord } from '@/monitor/source';
import {
  isTerminal,
  type UnitState,
  type WorkflowOutcome,
  type WorkUnit,
} from '@/monitor/types';

import type { ParseResult } from './types';

export type RuleEffect =
  | { kind: 'unit'; state: UnitState; cached?: boolean }
  | { kind: 'workflow'; outcome: Exclude<WorkflowOutcome, 'running'> }
  | { kind: 'total' };

export type GrammarRule = {
  name: string;
  /** Non-global pattern; named groups `id`, `label` and `total` are read. */
  pattern: RegExp;
  effect: RuleEffect;
  /**
   * Take the unit id from the indented block under the match (e.g. a
   * `jobid: N` line below a rule header). Falls back to `id`, then `label`.
   */
  blockId?: RegExp;
  /** Unit id comes from the record origin (one unit per file). */
  idFromOrigin?: boolean;
  /** Activity text for a terminal transition; defaults to the trimmed line. */
  activity?: (match: RegExpExecArray, unit: WorkUnit) => string;
};

export type Grammar = {
  rules: readonly GrammarRule[];
  /** A unit announced by the mere presence of an origin (running until proven otherwise). */
  originUnit?: (origin: string) => { id: string; label: string };
  /** Units known before any line is read (e.g. explicitly requested jobs). */
  seed?: readonly WorkUnit[];
};

const RANK: Record<UnitState, number> = {
  pending: 0,
  running: 1,
  completed: 2,
  failed: 3,
};

/** Terminal states are sticky; otherwise never move backwards. */
export const advance = (
  prev: UnitState | undefined,
  next: UnitState,
): UnitState => {
  if (prev === undefined) return next;
  if (isTerminal(prev)) return prev;
  return RANK[next] >= RANK[prev] ? next : prev;
};

const BLOCK_SCAN_LIMIT = 50;

const idFromBlock = (
  records: readonly LogRecord[],
  start: number,
  pattern: RegExp,
): string | undefined => {
  const end = Math.min(records.length, start + 1 + BLOCK_SCAN_LIMIT);
  for (let i = start + 1; i < end; i += 1) {
    const text = records[i]?.text ?? '';
    if (!/^\s+\S/.test(text)) return undefined;
    const id = pattern.exec(text)?.groups?.id;
    if (id) return id;
  }
  return undefined;
};

type UnitMatch = {
  rule: GrammarRule;
  match: RegExpExecArray;
  state: UnitState;
  cached: boolean;
};

export const parseWithGrammar = (
  grammar: Grammar,
  records: readonly LogRecord[],
): ParseResult => {
  const units = new Map<string, WorkUnit>();
  for (const u of grammar.seed ?? []) units.set(u.id, { ...u });
  const activity: string[] = [];
  const origins = new Set<string>();
  let declaredTotal: number | undefined;
  let succeeded = false;
  let failed = false;

  const touch = (
    id: string,
    label: string | undefined,
    state: UnitState,
    cached: boolean,
  ): { unit: WorkUnit; becameTerminal: boolean } => {
    const prior = units.get(id);
    const nextState = advance(prior?.state, state);
    const unit: WorkUnit = {
      id,
      label: prior && prior.label !== prior.id ? prior.label : (label ?? id),
      state: nextState,
    };
    const cachedNow = prior?.cached ?? (cached && nextState === 'completed');
    if (cachedNow) unit.cached = true;
    units.set(id, unit);
    return {
      unit,
      becameTerminal: isTerminal(nextState) && prior?.state !== nextState,
    };
  };

  records.forEach((rec, index) => {
    if (grammar.originUnit && !origins.has(rec.origin)) {
      origins.add(rec.origin);
      const o = grammar.originUnit(rec.origin);
      touch(o.id, o.label, 'running', false);
    }

    let best: UnitMatch | undefined;
    for (const rule of grammar.rules) {
      const match = rule.pattern.exec(rec.text);
      if (!match) continue;
      const effect = rule.effect;
      if (effect.kind === 'workflow') {
        if (effect.outcome === 'failed') failed = true;
        else succeeded = true;
        continue;
      }
      if (effect.kind === 'total') {
        const n = Number.parseInt(match.groups?.total ?? '', 10);
        if (Number.isInteger(n) && n >= 0) declaredTotal = n;
        continue;
      }
      if (!best || RANK[effect.state] > RANK[best.state]) {
        best = {
          rule,
          match,
          state: effect.state,
          cached: Boolean(effect.cached),
        };
      }
    }
    if (!best) return;

    const { rule, match } = best;
    const groups = match.groups ?? {};
    const label = groups.label || undefined;
    const id = rule.idFromOrigin
      ? grammar.originUnit?.(rec.origin).id
      : ((rule.blockId ? idFromBlock(records, index, rule.blockId) : undefined) ??
        (groups.id || label));
    // A match without an identifiable unit is an anomaly: ignore it.
    if (!id) return;

    const { unit, becameTerminal } = touch(id, label, best.state, best.cached);
    if (becameTerminal) {
      activity.push(rule.activity ? rule.activity(match, unit) : rec.text.trim());
    }
  });

  const outcome: WorkflowOutcome = failed
    ? 'failed'
    : succeeded
      ? 'succeeded'
      : 'running';
  const result: ParseResult = {
    units: Array.from(units.values()),
    activity,
    outcome,
  };
  if (declaredTotal !== undefined) result.declaredTotal = declaredTotal;
  return result;
};
