/* src/monitor/state/control.ts
 * Health check and stop over persisted monitor state files.
 */
import fg from 'fast-glob';

import { errorMessage, UsageError } from '@/monitor/errors';
import type { ResourceSampler } from '@/monitor/process/resources';
import { isProcessAlive } from '@/monitor/process/watch';
import type { EngineKind, ResourceSample } from '@/monitor/types';
import { debugTrace } from '@/util/debug';
import { DBG_SCOPE_STATE } from '@/util/debug-scopes';

import {
  engineOfStateFile,
  type MonitorState,
  readState,
  removeState,
  STATE_SUFFIX,
  statePath,
} from './store';

export type HealthEntry = {
  engine: EngineKind;
  file: string;
  state?: MonitorState;
  alive: boolean;
  /** Set when the file was stale or unreadable (and has been removed). */
  problem?: string;
  sample?: ResourceSample;
};

export type StopResult =
  | { kind: 'stopped'; pid: number; state: MonitorState }
  | { kind: 'not-running'; reason: string };

export type SignalProcess = (pid: number, signal: NodeJS.Signals) => void;

/** Signals the monitor alone; a workflow it started with --exec keeps running. */
export const signalProcess: SignalProcess = (pid, signal) => {
  process.kill(pid, signal);
};

export const listStateFiles = async (stateDir: string): Promise<string[]> =>
  (
    await fg(`*${STATE_SUFFIX}`, {
      cwd: stateDir,
      absolute: true,
      onlyFiles: true,
    })
  ).sort();

export const checkHealth = async (opts: {
  stateDir: string;
  engine?: EngineKind;
  alive?: (pid: number) => boolean;
  sampler?: ResourceSampler;
}): Promise<HealthEntry[]> => {
  const alive = opts.alive ?? isProcessAlive;
  const files = opts.engine
    ? [statePath(opts.stateDir, opts.engine)]
    : await listStateFiles(opts.stateDir);

  const out: HealthEntry[] = [];
  for (const file of files) {
    const engine = engineOfStateFile(file);
    if (!engine) continue;
    let state: MonitorState | undefined;
    try {
      state = await readState(file);
    } catch (e) {
      await removeState(file);
      out.push({
        engine,
        file,
        alive: false,
        problem: `unreadable state file removed (${errorMessage(e)})`,
      });
      continue;
    }
    if (!state) continue;
    if (!alive(state.pid)) {
      await removeState(file);
      out.push({
        engine,
        file,
        state,
        alive: false,
        problem: `stale state removed (pid ${state.pid.toString()} not running)`,
      });
      continue;
    }
    const entry: HealthEntry = { engine, file, state, alive: true };
    const sample = await opts.sampler?.(state.pid);
    if (sample) entry.sample = sample;
    out.push(entry);
  }
  return out;
};

export const stopMonitor = async (opts: {
  stateDir: string;
  engine: EngineKind;
  alive?: (pid: number) => boolean;
  kill?: SignalProcess;
}): Promise<StopResult> => {
  const file = statePath(opts.stateDir, opts.engine);
  const state = await readState(file);
  if (!state) {
    return { kind: 'not-running', reason: `no ${opts.engine} monitor state in ${opts.stateDir}` };
  }
  const alive = opts.alive ?? isProcessAlive;
  if (!alive(state.pid)) {
    await removeState(file);
    return {
      kind: 'not-running',
      reason: `stale state removed (pid ${state.pid.toString()} not running)`,
    };
  }
  (opts.kill ?? signalProcess)(state.pid, 'SIGTERM');
  await removeState(file);
  return { kind: 'stopped', pid: state.pid, state };
};

/** One monitor per state file: refuse to start while the recorded pid lives. */
export const assertNoLiveMonitor = async (opts: {
  file: string;
  engine: EngineKind;
  self: number;
  alive?: (pid: number) => boolean;
}): Promise<void> => {
  let state: MonitorState | undefined;
  try {
    state = await readState(opts.file);
  } catch (e) {
    debugTrace(DBG_SCOPE_STATE, `ignoring unreadable ${opts.file}: ${errorMessage(e)}`);
    return;
  }
  if (!state || state.pid === opts.self) return;
  if ((opts.alive ?? isProcessAlive)(state.pid)) {
    throw new UsageError(`${opts.engine} monitor already running (pid ${state.pid.toString()})`);
  }
};

/** Remove the state file only while it still records `self`. */
export const releaseState = async (file: string, self: number): Promise<boolean> => {
  let state: MonitorState | undefined;
  try {
    state = await readState(file);
  } catch (e) {
    debugTrace(DBG_SCOPE_STATE, `leaving unreadable ${file}: ${errorMessage(e)}`);
    return false;
  }
  if (state?.pid !== self) return false;
  await removeState(file);
  return true;
};
