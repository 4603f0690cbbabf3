// src/monitor/parser/snakemake.ts
import type { LogRecord } from '@/monitor/source';

import { type Grammar, type GrammarRule, parseWithGrammar } from './grammar';
import type { EventParser } from './types';

const JOBID_LINE = /^\s+jobid:\s*(?<id>\S+)/;
const JOB_ID = String.raw`(?<id>[^\s.,;:'"]+)`;

export const SNAKEMAKE_RULES: readonly GrammarRule[] = [
  {
    name: 'rule-header',
    pattern: /^\s*(?:local)?rule (?<label>[\w.-]+):\s*$/,
    effect: { kind: 'unit', state: 'pending' },
    blockId: JOBID_LINE,
  },
  {
    name: 'submitted',
    pattern: new RegExp(String.raw`\bSubmitted (?:group |batch )?job ${JOB_ID}`),
    effect: { kind: 'unit', state: 'running' },
  },
  {
    name: 'finished',
    pattern: new RegExp(String.raw`\bFinished job ${JOB_ID}`),
    effect: { kind: 'unit', state: 'completed' },
  },
  {
    name: 'error-in-rule',
    pattern: /\bError in rule (?<label>[\w.-]+):?/,
    effect: { kind: 'unit', state: 'failed' },
    blockId: JOBID_LINE,
  },
  {
    name: 'steps',
    pattern: /\b\d+ of (?<total>\d+) steps \(\d+%\) done/,
    effect: { kind: 'total' },
  },
  {
    name: 'workflow-complete',
    pattern: /\(100%\) done|^\s*Complete log:/,
    effect: { kind: 'workflow', outcome: 'succeeded' },
  },
  {
    name: 'workflow-failed',
    pattern: /\bExiting because a job execution failed\b/,
    effect: { kind: 'workflow', outcome: 'failed' },
  },
];

const grammar: Grammar = { rules: SNAKEMAKE_RULES };

export const createSnakemakeParser = (): EventParser => ({
  engine: 'snakemake',
  parse: (records: readonly LogRecord[]) => parseWithGrammar(grammar, records),
});
