import { describe, expect, it } from 'vitest';

import type { ProgressSnapshot } from '@/monitor/types';

import { composeDashboard, type DashboardFrame, summaryLine } from './frame';

const snapshot: ProgressSnapshot = {
  total: 5,
  counts: { pending: 0, running: 2, completed: 3, failed: 0 },
  cached: 0,
  percent: 60,
  elapsedSec: 20,
  etaSec: 13,
  at: 20_000,
};

const frame = (over: Partial<DashboardFrame> = {}): DashboardFrame => ({
  engine: 'snakemake',
  source: 'logs/snakemake.log',
  snapshot,
  outcome: 'running',
  recent: ['Finished job 1.', 'Finished job 2.', 'Finished job 3.'],
  ...over,
});

describe('composeDashboard (BORING)', () => {
  const lines = composeDashboard(frame(), { barWidth: 10, recentLines: 2 }).split('\n');

  it('prints header, clock line and a fixed-width bar', () => {
    expect(lines.slice(0, 5)).toEqual([
      '',
      'wfmon: snakemake logs/snakemake.log',
      'Elapsed 00:00:20  ETA 00:00:13',
      '',
      '[======>   ] 60%',
    ]);
  });

  it('lays out the state counts as a table', () => {
    expect(lines.some((l) => /^\[RUN\]\s+2\s*$/.test(l))).toBe(true);
    expect(lines.some((l) => /^\[OK\]\s+3\s*$/.test(l))).toBe(true);
    expect(lines.some((l) => /^Total\s+5\s*$/.test(l))).toBe(true);
  });

  it('shows only the most recent activity lines', () => {
    const i = lines.indexOf('Recent');
    expect(lines.slice(i + 1, i + 3)).toEqual(['  Finished job 2.', '  Finished job 3.']);
  });

  it('shows the resource sample when present', () => {
    const out = composeDashboard(
      frame({ resources: { pid: 42, cpuPercent: 12.5, rssBytes: 300 * 1024 * 1024 } }),
      { barWidth: 10, recentLines: 5 },
    );
    expect(out.trimEnd().split('\n').at(-1)).toBe('Process 42  cpu 12.5%  mem 300MB');
  });

  it('marks an unknown ETA', () => {
    const out = composeDashboard(
      frame({ snapshot: { ...snapshot, etaSec: null } }),
      { barWidth: 10, recentLines: 5 },
    );
    expect(out.split('\n')[2]).toBe('Elapsed 00:00:20  ETA unknown');
  });
});

describe('summaryLine', () => {
  it('condenses the snapshot into one line', () => {
    expect(summaryLine(frame())).toBe(
      'snakemake 3/5 (60%) running=2 failed=0 eta=00:00:13',
    );
  });
});
