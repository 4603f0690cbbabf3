/* src/cli/control/action.ts
 * `status` and `stop` over persisted monitor state.
 */
import { resolveSettings } from '@/cli/config/load';
import { fmtDuration, fmtMemory } from '@/monitor/format';
import { createPsSampler, type ResourceSampler } from '@/monitor/process/resources';
import { checkHealth, type HealthEntry, type SignalProcess, stopMonitor } from '@/monitor/state';
import type { EngineKind } from '@/monitor/types';
import { error, ok } from '@/util/color';
import { consoleLog, type Log } from '@/util/log';

export type ControlDeps = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  log?: Log;
  alive?: (pid: number) => boolean;
  sampler?: ResourceSampler;
  kill?: SignalProcess;
  now?: () => number;
};

export const describeEntry = (e: HealthEntry, nowMs: number): string => {
  const s = e.state;
  if (!s) return `${e.engine}: ${e.problem ?? 'no state'}`;
  const up = fmtDuration(Math.floor(nowMs / 1000) - s.started);
  const parts = [
    `${e.engine}: pid ${s.pid.toString()} ${e.alive ? ok('alive') : error('gone')}`,
    `up ${up}`,
    `${s.completed.toString()}/${s.total.toString()} (${s.percent.toString()}%)`,
    `running=${s.running.toString()} failed=${s.failed.toString()}`,
    `source=${s.source}`,
  ];
  if (e.sample) {
    parts.push(`cpu ${e.sample.cpuPercent.toFixed(1)}% mem ${fmtMemory(e.sample.rssBytes)}`);
  }
  return parts.join('  ');
};

/** 0 when at least one live monitor was found, 1 otherwise. */
export const runStatus = async (
  engine: EngineKind | undefined,
  deps: ControlDeps = {},
): Promise<number> => {
  const log = deps.log ?? consoleLog;
  const settings = await resolveSettings({
    cwd: deps.cwd ?? process.cwd(),
    ...(deps.env ? { env: deps.env } : {}),
  });
  const entries = await checkHealth({
    stateDir: settings.stateDir,
    sampler: deps.sampler ?? createPsSampler(),
    ...(engine ? { engine } : {}),
    ...(deps.alive ? { alive: deps.alive } : {}),
  });
  const now = (deps.now ?? Date.now)();
  for (const e of entries) {
    if (e.alive) log.info(describeEntry(e, now));
    else log.warn(describeEntry(e, now));
  }
  const live = entries.filter((e) => e.alive).length;
  if (live === 0) {
    log.info(`no ${engine ?? 'wfmon'} monitor running (state dir ${settings.stateDir})`);
    return 1;
  }
  return 0;
};

export const runStop = async (engine: EngineKind, deps: ControlDeps = {}): Promise<number> => {
  const log = deps.log ?? consoleLog;
  const settings = await resolveSettings({
    cwd: deps.cwd ?? process.cwd(),
    ...(deps.env ? { env: deps.env } : {}),
  });
  const res = await stopMonitor({
    stateDir: settings.stateDir,
    engine,
    ...(deps.alive ? { alive: deps.alive } : {}),
    ...(deps.kill ? { kill: deps.kill } : {}),
  });
  if (res.kind === 'stopped') {
    log.info(`stopped ${engine} monitor (pid ${res.pid.toString()}, source ${res.state.source})`);
    return 0;
  }
  log.warn(res.reason);
  return 1;
};
