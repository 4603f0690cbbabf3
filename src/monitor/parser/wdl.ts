// src/monitor/parser/wdl.ts
import path from 'node:path';

import type { LogRecord } from '@/monitor/source';

import { type Grammar, type GrammarRule, parseWithGrammar } from './grammar';
import type { EventParser } from './types';

export const WDL_RULES: readonly GrammarRule[] = [
  {
    name: 'workflow-succeeded',
    pattern: /workflow finished with status '(?:Succeeded|Done)'/i,
    effect: { kind: 'unit', state: 'completed' },
    idFromOrigin: true,
    activity: (_m, unit) => `${unit.label} succeeded`,
  },
  {
    name: 'workflow-failed',
    pattern: /\bworkflow failed\b|finished with status '(?:Failed|Aborted)'/i,
    effect: { kind: 'unit', state: 'failed' },
    idFromOrigin: true,
    activity: (_m, unit) => `${unit.label} failed`,
  },
];

/** One log file per workflow; the unit id is the file name without `.log`. */
export const workflowIdOf = (origin: string): string =>
  path.basename(origin).replace(/\.log$/, '');

const grammar: Grammar = {
  rules: WDL_RULES,
  originUnit: (origin) => {
    const id = workflowIdOf(origin);
    return { id, label: id };
  },
};

/**
 * `single`: the source is one workflow log, so that workflow's verdict is
 * the run's verdict. A directory of logs has no global completion marker.
 */
export const createWdlParser = (opts: { single?: boolean } = {}): EventParser => ({
  engine: 'wdl',
  parse: (records: readonly LogRecord[]) => {
    const result = parseWithGrammar(grammar, records);
    const only = result.units.length === 1 ? result.units[0] : undefined;
    if (opts.single && only) {
      if (only.state === 'completed') result.outcome = 'succeeded';
      else if (only.state === 'failed') result.outcome = 'failed';
    }
    return result;
  },
});
