import { spawn } from 'node:child_process';
import { access, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { UsageError } from '@/monitor/errors';
import { isProcessAlive } from '@/monitor/process/watch';
import type { EngineKind } from '@/monitor/types';

import { assertNoLiveMonitor, checkHealth, releaseState, stopMonitor } from './control';
import { type MonitorState, statePath, writeState } from './store';

const stateFor = (engine: EngineKind, pid: number): MonitorState => ({
  timestamp: 1_700_000_020,
  engine,
  source: `${engine}.log`,
  pid,
  started: 1_700_000_000,
  total: 4,
  pending: 1,
  running: 1,
  completed: 2,
  failed: 0,
  percent: 50,
  last_update: '2023-11-14T22:13:40.000Z',
});

const exists = async (p: string) =>
  access(p).then(
    () => true,
    () => false,
  );

describe('monitor control', () => {
  let dir: string;
  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'wfmon-ctl-'));
    await writeState(statePath(dir, 'snakemake'), stateFor('snakemake', 111));
    await writeState(statePath(dir, 'nextflow'), stateFor('nextflow', 222));
  });
  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reports live monitors and removes stale state', async () => {
    const entries = await checkHealth({
      stateDir: dir,
      alive: (pid) => pid === 111,
      sampler: (pid) => Promise.resolve({ pid, cpuPercent: 1.5, rssBytes: 2048 }),
    });
    expect(entries.map((e) => [e.engine, e.alive, e.problem])).toEqual([
      ['nextflow', false, 'stale state removed (pid 222 not running)'],
      ['snakemake', true, undefined],
    ]);
    expect(entries[1]?.sample).toEqual({ pid: 111, cpuPercent: 1.5, rssBytes: 2048 });
    expect(await exists(statePath(dir, 'nextflow'))).toBe(false);
    expect(await exists(statePath(dir, 'snakemake'))).toBe(true);
  });

  it('narrows the check to one engine', async () => {
    const entries = await checkHealth({ stateDir: dir, engine: 'wdl', alive: () => true });
    expect(entries).toEqual([]);
  });

  it('signals the recorded monitor and removes its state', async () => {
    const killed: [number, string][] = [];
    const res = await stopMonitor({
      stateDir: dir,
      engine: 'snakemake',
      alive: () => true,
      kill: (pid, signal) => {
        killed.push([pid, signal]);
      },
    });
    expect(res.kind).toBe('stopped');
    expect(killed).toEqual([[111, 'SIGTERM']]);
    expect(await exists(statePath(dir, 'snakemake'))).toBe(false);
  });

  it('reports when nothing is running', async () => {
    const res = await stopMonitor({ stateDir: dir, engine: 'slurm' });
    expect(res).toEqual({ kind: 'not-running', reason: `no slurm monitor state in ${dir}` });
  });

  it('stops only the monitor process, not the workflow it started', async () => {
    const monitor = spawn('sh', ['-c', 'sleep 30 & echo $!; wait'], {
      stdio: ['ignore', 'pipe', 'ignore'],
    });
    const workflowPid = await new Promise<number>((resolveP) => {
      monitor.stdout.once('data', (d: Buffer) => {
        resolveP(Number.parseInt(d.toString('utf8'), 10));
      });
    });
    const exited = new Promise<void>((resolveP) => monitor.once('exit', () => resolveP()));
    try {
      if (monitor.pid === undefined) throw new Error('sh did not start');
      await writeState(statePath(dir, 'wdl'), stateFor('wdl', monitor.pid));
      const res = await stopMonitor({ stateDir: dir, engine: 'wdl' });
      expect(res).toMatchObject({ kind: 'stopped', pid: monitor.pid });
      await exited;
      expect(isProcessAlive(workflowPid)).toBe(true);
    } finally {
      if (isProcessAlive(workflowPid)) process.kill(workflowPid, 'SIGKILL');
    }
  });

  it('refuses a second monitor while the recorded one is alive', async () => {
    const file = statePath(dir, 'snakemake');
    await expect(
      assertNoLiveMonitor({ file, engine: 'snakemake', self: 999, alive: () => true }),
    ).rejects.toThrow(new UsageError('snakemake monitor already running (pid 111)'));
    await expect(
      assertNoLiveMonitor({ file, engine: 'snakemake', self: 999, alive: () => false }),
    ).resolves.toBeUndefined();
    await expect(
      assertNoLiveMonitor({ file, engine: 'snakemake', self: 111, alive: () => true }),
    ).resolves.toBeUndefined();
  });

  it('releases the state file only for the monitor that owns it', async () => {
    const file = statePath(dir, 'snakemake');
    expect(await releaseState(file, 222)).toBe(false);
    expect(await exists(file)).toBe(true);
    expect(await releaseState(file, 111)).toBe(true);
    expect(await exists(file)).toBe(false);
  });
});
