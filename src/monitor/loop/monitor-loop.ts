/* src/monitor/loop/monitor-loop.ts
 * Idle -> Polling -> (Idle | Terminated), generic over the engine parser.
 *
 * The sleep between ticks is the only suspension point and is aborted by
 * the cancellation signal; a cancelled loop runs one final pass.
 */
import { errorMessage, SourceUnavailableError, StartupError } from '@/monitor/errors';
import { ProgressModel } from '@/monitor/model';
import { type NotificationSink, workflowEvent } from '@/monitor/notify';
import type { EventParser } from '@/monitor/parser';
import type { ResourceSampler } from '@/monitor/process/resources';
import type { WatchedProcess } from '@/monitor/process/watch';
import type { Renderer } from '@/monitor/render';
import type { LogRecord, LogSource } from '@/monitor/source';
import { assertNoLiveMonitor, releaseState } from '@/monitor/state';
import type { EngineKind, ProgressSnapshot, WorkflowOutcome } from '@/monitor/types';
import { debugTrace } from '@/util/debug';
import { DBG_SCOPE_LOOP } from '@/util/debug-scopes';
import { consoleLog, type Log } from '@/util/log';

import { sleep } from './sleep';
import { runTick, type TickContext, type TickState } from './tick';

export type MonitorPhase = 'idle' | 'polling' | 'terminated';

export type TerminationReason = 'workflow' | 'process-exit' | 'cancelled';

export type MonitorOptions = {
  engine: EngineKind;
  source: LogSource;
  parser: EventParser;
  renderer: Renderer;
  sink: NotificationSink;
  stateFile: string;
  intervalMs: number;
  startupRetries: number;
  startupRetryDelayMs: number;
  signal?: AbortSignal;
  watched?: WatchedProcess;
  sampler?: ResourceSampler;
  log?: Log;
  now?: () => number;
  /** Recorded in the state file; defaults to this process. */
  pid?: number;
  /** Liveness check for a monitor already recorded in the state file. */
  alive?: (pid: number) => boolean;
};

export type MonitorResult = {
  exitCode: 0 | 1;
  reason: TerminationReason;
  outcome: WorkflowOutcome;
  snapshot: ProgressSnapshot;
  ticks: number;
};

/** Read until the source answers, within the startup retry budget. */
const awaitSource = async (
  source: LogSource,
  opts: Pick<MonitorOptions, 'startupRetries' | 'startupRetryDelayMs' | 'signal'>,
): Promise<LogRecord[] | undefined> => {
  const attempts = opts.startupRetries + 1;
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await source.read();
    } catch (e) {
      if (!(e instanceof SourceUnavailableError)) throw e;
      if (attempt >= attempts) {
        throw new StartupError(
          `${e.message} (gave up after ${attempts.toString()} attempt${attempts === 1 ? '' : 's'})`,
          { cause: e },
        );
      }
      debugTrace(DBG_SCOPE_LOOP, `startup attempt ${attempt.toString()} failed: ${e.message}`);
      if (!(await sleep(opts.startupRetryDelayMs, opts.signal))) return undefined;
    }
  }
};

const isJobFailed = (
  outcome: WorkflowOutcome,
  s: ProgressSnapshot,
  watched?: WatchedProcess,
): boolean => {
  const code = watched?.exitCode();
  return outcome === 'failed' || s.counts.failed > 0 || (code ?? 0) !== 0;
};

export const runMonitor = async (opts: MonitorOptions): Promise<MonitorResult> => {
  const log = opts.log ?? consoleLog;
  const now = opts.now ?? Date.now;
  let phase: MonitorPhase = 'idle';
  const enter = (p: MonitorPhase): void => {
    if (p !== phase) debugTrace(DBG_SCOPE_LOOP, `${phase} -> ${p}`);
    phase = p;
  };

  const ctx: TickContext = {
    engine: opts.engine,
    source: opts.source,
    parser: opts.parser,
    renderer: opts.renderer,
    sink: opts.sink,
    log,
    stateFile: opts.stateFile,
    pid: opts.pid ?? process.pid,
    now,
    ...(opts.watched ? { watched: opts.watched } : {}),
    ...(opts.sampler ? { sampler: opts.sampler } : {}),
  };
  let state: TickState = {
    model: ProgressModel.start(now()),
    activity: [],
    stateWarned: false,
  };

  await assertNoLiveMonitor({
    file: opts.stateFile,
    engine: opts.engine,
    self: ctx.pid,
    ...(opts.alive ? { alive: opts.alive } : {}),
  });
  const first = await awaitSource(opts.source, opts);
  let preloaded = first;
  let ticks = 0;
  let reason: TerminationReason = 'cancelled';

  try {
    if (!first) {
      // Cancelled while waiting for the source: still render once.
      state = await runTick(ctx, state, []);
      ticks += 1;
    } else {
      for (;;) {
        enter('polling');
        const exitedBefore = opts.watched?.exited() ?? false;
        state = await runTick(ctx, state, preloaded);
        preloaded = undefined;
        ticks += 1;
        if (state.model.outcome !== 'running') {
          reason = 'workflow';
          break;
        }
        if (exitedBefore) {
          reason = 'process-exit';
          break;
        }
        enter('idle');
        if (!(await sleep(opts.intervalMs, opts.signal))) {
          enter('polling');
          state = await runTick(ctx, state);
          ticks += 1;
          break;
        }
      }
    }
  } finally {
    enter('terminated');
    opts.renderer.done();
    await releaseState(opts.stateFile, ctx.pid).catch((e: unknown) => {
      log.warn(`cannot remove state file ${opts.stateFile}: ${errorMessage(e)}`);
    });
  }

  const snapshot = state.snapshot ?? state.model.snapshot(now());
  const outcome = state.model.outcome;
  const failed = isJobFailed(outcome, snapshot, opts.watched);
  if (reason !== 'cancelled') {
    await opts.sink.notify(workflowEvent(opts.engine, failed, snapshot));
  }
  debugTrace(DBG_SCOPE_LOOP, `terminated (${reason}) after ${ticks.toString()} ticks`);
  return { exitCode: failed ? 1 : 0, reason, outcome, snapshot, ticks };
};
