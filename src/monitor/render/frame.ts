// src/monitor/render/frame.ts
// Compose dashboard text from a snapshot (content-only; no I/O).
import { table } from 'table';

import {
  fmtClock,
  fmtMemory,
  progressBar,
} from '@/monitor/format';
import type {
  EngineKind,
  ProgressSnapshot,
  ResourceSample,
  UnitState,
  WorkflowOutcome,
} from '@/monitor/types';
import { bold, dim, error, ok } from '@/util/color';

import { label } from './labels';

export type DashboardFrame = {
  engine: EngineKind;
  source: string;
  snapshot: ProgressSnapshot;
  outcome: WorkflowOutcome;
  /** Terminal-state activity lines, oldest first. */
  recent: readonly string[];
  resources?: ResourceSample;
};

export type FrameOptions = { barWidth: number; recentLines: number };

const STATES: readonly UnitState[] = ['pending', 'running', 'completed', 'failed'];

export const summaryTable = (rows: string[][]): string =>
  table(rows, {
    border: {
      topBody: ``,
      topJoin: ``,
      topLeft: ``,
      topRight: ``,
      bottomBody: ``,
      bottomJoin: ``,
      bottomLeft: ``,
      bottomRight: ``,
      bodyLeft: ``,
      bodyRight: ``,
      bodyJoin: ``,
      joinBody: ``,
      joinLeft: ``,
      joinRight: ``,
      joinJoin: ``,
    },
    drawHorizontalLine: () => false,
    columns: {
      0: { alignment: 'left' },
      1: { alignment: 'left' },
    },
  });

const outcomeText = (o: WorkflowOutcome): string =>
  o === 'succeeded' ? ok('workflow complete') : o === 'failed' ? error('workflow failed') : '';

export const fmtEta = (etaSec: number | null): string =>
  etaSec === null ? 'unknown' : fmtClock(etaSec);

export const composeDashboard = (frame: DashboardFrame, opts: FrameOptions): string => {
  const { snapshot: s } = frame;
  const out: string[] = [];

  const verdict = outcomeText(frame.outcome);
  out.push(`${bold(`wfmon: ${frame.engine}`)} ${dim(frame.source)}${verdict ? `  ${verdict}` : ''}`);
  out.push(`Elapsed ${fmtClock(s.elapsedSec)}  ETA ${fmtEta(s.etaSec)}`);
  out.push('');
  out.push(progressBar(s.percent, opts.barWidth));
  out.push('');

  const rows = [[bold('Status'), bold('Count')]];
  for (const st of STATES) rows.push([label(st), s.counts[st].toString()]);
  if (s.cached > 0) rows.push([dim('cached'), s.cached.toString()]);
  rows.push([bold('Total'), s.total.toString()]);
  out.push(
    summaryTable(rows)
      .split('\n')
      .map((l) => (l.startsWith(' ') ? l.slice(1) : l))
      .join('\n')
      .trimEnd(),
  );

  const recent = frame.recent.slice(-opts.recentLines);
  if (recent.length > 0) {
    out.push('', bold('Recent'));
    for (const line of recent) out.push(`  ${line}`);
  }

  if (frame.resources) {
    const r = frame.resources;
    out.push(
      '',
      `Process ${r.pid.toString()}  cpu ${r.cpuPercent.toFixed(1)}%  mem ${fmtMemory(r.rssBytes)}`,
    );
  }
  return `\n${out.join('\n')}\n`;
};

/** One-line form for non-TTY output. */
export const summaryLine = (frame: DashboardFrame): string => {
  const s = frame.snapshot;
  return (
    `${frame.engine} ${s.counts.completed.toString()}/${s.total.toString()} (${s.percent.toString()}%) ` +
    `running=${s.counts.running.toString()} failed=${s.counts.failed.toString()} eta=${fmtEta(s.etaSec)}`
  );
};
