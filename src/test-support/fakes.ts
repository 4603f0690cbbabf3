// src/test-support/fakes.ts
// In-process stand-ins for sources, renderers, notifiers and logs.
import { SourceUnavailableError } from '@/monitor/errors';
import type { Notifier } from '@/monitor/notify';
import type { DashboardFrame, Renderer } from '@/monitor/render';
import { type LogRecord, type LogSource, toRecords } from '@/monitor/source';
import type { NotificationEvent } from '@/monitor/types';
import type { Log } from '@/util/log';

/** Lines held in memory; set `failure` to make reads throw. */
export class MemorySource implements LogSource {
  lines: string[] = [];
  failure?: string;
  reads = 0;

  constructor(readonly id = 'mem') {}

  read(): Promise<LogRecord[]> {
    this.reads += 1;
    if (this.failure !== undefined) {
      return Promise.reject(new SourceUnavailableError(this.id, this.failure));
    }
    return Promise.resolve(toRecords(this.id, this.lines.join('\n')));
  }
}

export class RecordingRenderer implements Renderer {
  readonly frames: DashboardFrame[] = [];
  finished = 0;

  constructor(private readonly onDraw?: (frame: DashboardFrame, n: number) => void) {}

  draw(frame: DashboardFrame): void {
    this.frames.push(frame);
    this.onDraw?.(frame, this.frames.length);
  }

  done(): void {
    this.finished += 1;
  }
}

export const recordingNotifier = (
  delivered = true,
): Notifier & { sent: NotificationEvent[] } => {
  const sent: NotificationEvent[] = [];
  return {
    sent,
    send: (e) => {
      sent.push(e);
      return Promise.resolve(delivered);
    },
  };
};

export const captureLog = (): Log & { lines: string[] } => {
  const lines: string[] = [];
  return {
    lines,
    info: (m) => lines.push(`info ${m}`),
    warn: (m) => lines.push(`warn ${m}`),
    error: (m) => lines.push(`error ${m}`),
  };
};
