// src/monitor/parser/nextflow.ts
import type { LogRecord } from '@/monitor/source';

import { type Grammar, type GrammarRule, parseWithGrammar } from './grammar';
import type { EventParser } from './types';

const TASK = String.raw`\bTask completed > TaskHandler\[.*?\bname: (?<id>[^;\]]+?); status: COMPLETED; exit: `;

export const NEXTFLOW_RULES: readonly GrammarRule[] = [
  {
    name: 'submitted',
    pattern: /\bSubmitted process > (?<id>.+?)\s*$/,
    effect: { kind: 'unit', state: 'running' },
  },
  {
    name: 'cached',
    pattern: /\bCached process > (?<id>.+?)\s*$/,
    effect: { kind: 'unit', state: 'completed', cached: true },
  },
  {
    name: 'completed',
    pattern: /\bCompleted process > (?<id>.+?)\s*$/,
    effect: { kind: 'unit', state: 'completed' },
  },
  {
    name: 'task-ok',
    pattern: new RegExp(`${TASK}0[;\\]]`),
    effect: { kind: 'unit', state: 'completed' },
  },
  {
    name: 'task-failed',
    pattern: new RegExp(`${TASK}(?!0[;\\]])[^;\\]]+`),
    effect: { kind: 'unit', state: 'failed' },
  },
  {
    name: 'error-executing',
    pattern: /\bError executing process > '(?<id>[^']+)'/,
    effect: { kind: 'unit', state: 'failed' },
  },
  {
    name: 'error-marker',
    pattern: /\[E\]\s+(?:process > )?(?<id>[^[]+?)\s*(?:\[|$)/,
    effect: { kind: 'unit', state: 'failed' },
  },
  {
    name: 'workflow-complete',
    pattern: /\bExecution complete -- Goodbye\b/,
    effect: { kind: 'workflow', outcome: 'succeeded' },
  },
  {
    name: 'workflow-aborted',
    pattern: /\b(?:Execution|Session) aborted\b/,
    effect: { kind: 'workflow', outcome: 'failed' },
  },
  {
    name: 'fatal-error',
    pattern: /^\s*ERROR ~ |\bERROR nextflow\.cli\.Launcher\b/,
    effect: { kind: 'workflow', outcome: 'failed' },
  },
];

const grammar: Grammar = { rules: NEXTFLOW_RULES };

export const createNextflowParser = (): EventParser => ({
  engine: 'nextflow',
  parse: (records: readonly LogRecord[]) => parseWithGrammar(grammar, records),
});
