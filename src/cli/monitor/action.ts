/* src/cli/monitor/action.ts
 * Engine subcommand action: resolve settings, build the pipeline, run the loop.
 */
import path from 'node:path';

import { resolveSettings } from '@/cli/config/load';
import { planEngine } from '@/monitor/engines';
import { UsageError } from '@/monitor/errors';
import { runMonitor } from '@/monitor/loop';
import { attachTermination } from '@/monitor/loop/signals';
import { createDesktopNotifier, NotificationSink } from '@/monitor/notify';
import { createPsSampler } from '@/monitor/process/resources';
import {
  isProcessAlive,
  spawnWatched,
  watchPid,
  type WatchedProcess,
} from '@/monitor/process/watch';
import { createRenderer } from '@/monitor/render';
import { assertNoLiveMonitor, statePath } from '@/monitor/state';
import type { EngineKind } from '@/monitor/types';
import { consoleLog, type Log } from '@/util/log';

export type MonitorFlags = {
  interval?: number;
  notify?: boolean;
  pid?: number;
  exec?: string;
  run?: string;
  user?: string;
};

export type MonitorDeps = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  log?: Log;
};

/** Resolves the process exit code (0 ok, 1 observed job failed). */
export const runMonitorCommand = async (
  engine: EngineKind,
  selector: string | undefined,
  flags: MonitorFlags,
  deps: MonitorDeps = {},
): Promise<number> => {
  const cwd = deps.cwd ?? process.cwd();
  const log = deps.log ?? consoleLog;
  const settings = await resolveSettings({
    cwd,
    ...(deps.env ? { env: deps.env } : {}),
    flags: {
      ...(flags.interval !== undefined ? { interval: flags.interval } : {}),
      ...(flags.notify !== undefined ? { notify: flags.notify } : {}),
    },
  });

  if (flags.pid !== undefined && flags.exec !== undefined) {
    throw new UsageError('--pid and --exec cannot be combined');
  }
  const stateFile = statePath(settings.stateDir, engine);
  await assertNoLiveMonitor({ file: stateFile, engine, self: process.pid });
  if (flags.pid !== undefined && !isProcessAlive(flags.pid)) {
    throw new UsageError(`no running process with pid ${flags.pid.toString()}`);
  }
  const execOutput =
    flags.exec !== undefined
      ? path.join(settings.stateDir, `${engine}_exec.log`)
      : undefined;

  // Every argument is validated before the workflow command starts.
  const plan = await planEngine({
    engine,
    cwd,
    defaults: settings.engines,
    commandTimeoutMs: settings.commandTimeoutMs,
    startedAt: new Date(),
    ...(selector !== undefined ? { selector } : {}),
    ...(flags.run !== undefined ? { run: flags.run } : {}),
    ...(flags.user !== undefined ? { user: flags.user } : {}),
    ...(execOutput !== undefined ? { execOutput } : {}),
  });

  let watched: WatchedProcess | undefined;
  if (flags.pid !== undefined) {
    watched = watchPid(flags.pid);
  } else if (flags.exec !== undefined && execOutput !== undefined) {
    watched = spawnWatched({ command: flags.exec, cwd, outFile: execOutput });
    log.info(`started pid ${watched.pid.toString()}: ${flags.exec} (output: ${execOutput})`);
  }

  const controller = new AbortController();
  const detach = attachTermination(controller);
  try {
    log.info(
      `monitoring ${engine} ${plan.source.id} every ${settings.intervalSec.toString()}s`,
    );
    const result = await runMonitor({
      engine,
      source: plan.source,
      parser: plan.parser,
      renderer: createRenderer({
        barWidth: settings.barWidth,
        recentLines: settings.recentLines,
        log,
      }),
      sink: new NotificationSink({
        enabled: settings.notify,
        notifier: createDesktopNotifier(),
        log,
      }),
      stateFile,
      intervalMs: settings.intervalSec * 1000,
      startupRetries: settings.startupRetries,
      startupRetryDelayMs: settings.startupRetryDelayMs,
      signal: controller.signal,
      log,
      ...(watched ? { watched, sampler: createPsSampler() } : {}),
    });
    return result.exitCode;
  } finally {
    detach();
  }
};
