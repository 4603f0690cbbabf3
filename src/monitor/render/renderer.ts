/* src/monitor/render/renderer.ts
 * Dashboard sinks: in-place TTY frames (log-update) or appended summary lines.
 */
import logUpdate from 'log-update';

import { isBoring } from '@/util/color';
import { consoleLog, type Log } from '@/util/log';

import {
  composeDashboard,
  type DashboardFrame,
  type FrameOptions,
  summaryLine,
} from './frame';

export type Renderer = {
  draw(frame: DashboardFrame): void;
  /** Persist the last frame and release the terminal. */
  done(): void;
};

export class LiveDashboard implements Renderer {
  constructor(private readonly opts: FrameOptions) {}

  draw(frame: DashboardFrame): void {
    logUpdate(composeDashboard(frame, this.opts));
  }

  done(): void {
    logUpdate.done();
  }
}

/** Prints a summary line whenever the counts or verdict change. */
export class LogDashboard implements Renderer {
  private last = '';
  private lastFrame?: DashboardFrame;

  constructor(private readonly log: Log = consoleLog) {}

  draw(frame: DashboardFrame): void {
    this.lastFrame = frame;
    const s = frame.snapshot;
    const key = [
      s.total,
      s.counts.pending,
      s.counts.running,
      s.counts.completed,
      s.counts.failed,
      frame.outcome,
    ].join(',');
    if (key === this.last) return;
    this.last = key;
    this.log.info(summaryLine(frame));
  }

  done(): void {
    const f = this.lastFrame;
    if (!f) return;
    const r = f.resources;
    const tail = r ? ` (pid ${r.pid.toString()}, cpu ${r.cpuPercent.toFixed(1)}%)` : '';
    this.log.info(`${f.outcome === 'running' ? 'stopped' : `workflow ${f.outcome}`}${tail}`);
  }
}

export const createRenderer = (opts: FrameOptions & { log?: Log }): Renderer =>
  isBoring() ? new LogDashboard(opts.log) : new LiveDashboard(opts);
