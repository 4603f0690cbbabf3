/* src/monitor/loop/tick.ts
 * One poll-parse-render-notify-persist pass.
 */
import { errorMessage, SourceUnavailableError } from '@/monitor/errors';
import type { ProgressModel } from '@/monitor/model';
import { deriveNotifications, type NotificationSink } from '@/monitor/notify';
import type { EventParser } from '@/monitor/parser';
import type { ResourceSampler } from '@/monitor/process/resources';
import type { WatchedProcess } from '@/monitor/process/watch';
import type { Renderer } from '@/monitor/render';
import type { LogRecord, LogSource } from '@/monitor/source';
import { toMonitorState, writeState } from '@/monitor/state';
import type { EngineKind, ProgressSnapshot } from '@/monitor/types';
import { debugTrace } from '@/util/debug';
import { DBG_SCOPE_SOURCE } from '@/util/debug-scopes';
import type { Log } from '@/util/log';

export type TickContext = {
  engine: EngineKind;
  source: LogSource;
  parser: EventParser;
  renderer: Renderer;
  sink: NotificationSink;
  log: Log;
  stateFile: string;
  pid: number;
  now: () => number;
  watched?: WatchedProcess;
  sampler?: ResourceSampler;
};

export type TickState = {
  model: ProgressModel;
  /** Terminal-state activity from the latest successful read. */
  activity: readonly string[];
  /** Reason of the current source outage, reported once. */
  outage?: string;
  /** A failed state write was already reported. */
  stateWarned: boolean;
  snapshot?: ProgressSnapshot;
};

export const runTick = async (
  ctx: TickContext,
  prev: TickState,
  preloaded?: LogRecord[],
): Promise<TickState> => {
  const next: TickState = { ...prev };

  let records = preloaded;
  if (!records) {
    try {
      records = await ctx.source.read();
    } catch (e) {
      if (!(e instanceof SourceUnavailableError)) throw e;
      if (prev.outage === undefined) ctx.log.warn(`${e.message}; retrying`);
      next.outage = e.message;
    }
  }

  const now = ctx.now();
  if (records) {
    if (prev.outage !== undefined) ctx.log.info(`${ctx.source.id}: available again`);
    delete next.outage;
    debugTrace(DBG_SCOPE_SOURCE, `${ctx.source.id}: ${records.length.toString()} lines`);
    const result = ctx.parser.parse(records);
    const step = prev.model.apply(result, now);
    next.model = step.model;
    next.activity = result.activity;
    for (const event of deriveNotifications(ctx.engine, step.transitions)) {
      await ctx.sink.notify(event);
    }
  }

  const snapshot = next.model.snapshot(now);
  next.snapshot = snapshot;
  const resources =
    ctx.watched && ctx.sampler ? await ctx.sampler(ctx.watched.pid) : undefined;
  ctx.renderer.draw({
    engine: ctx.engine,
    source: ctx.source.id,
    snapshot,
    outcome: next.model.outcome,
    recent: next.activity,
    ...(resources ? { resources } : {}),
  });

  try {
    await writeState(
      ctx.stateFile,
      toMonitorState({
        engine: ctx.engine,
        source: ctx.source.id,
        pid: ctx.pid,
        startedAt: next.model.startedAt,
        snapshot,
      }),
    );
    next.stateWarned = false;
  } catch (e) {
    if (!prev.stateWarned) {
      ctx.log.warn(`cannot write state file ${ctx.stateFile}: ${errorMessage(e)}`);
    }
    next.stateWarned = true;
  }
  return next;
};
