import { describe, expect, it } from 'vitest';

import { ProgressModel } from '@/monitor/model';
import { createSnakemakeParser } from '@/monitor/parser';
import { toRecords } from '@/monitor/source';
import type { NotificationEvent } from '@/monitor/types';
import type { Log } from '@/util/log';

import { deriveNotifications } from './events';
import { NotificationSink } from './sink';
import type { Notifier } from './types';

const fakeNotifier = (ok: boolean): Notifier & { sent: NotificationEvent[] } => {
  const sent: NotificationEvent[] = [];
  return {
    sent,
    send: (e) => {
      sent.push(e);
      return Promise.resolve(ok);
    },
  };
};

const capture = (): Log & { lines: string[] } => {
  const lines: string[] = [];
  return {
    lines,
    info: (m) => lines.push(m),
    warn: (m) => lines.push(m),
    error: (m) => lines.push(m),
  };
};

const event = (key: string): NotificationEvent => ({
  key,
  title: 'snakemake: b failed',
  message: 'job 2 (b) failed',
  urgency: 'critical',
});

describe('NotificationSink', () => {
  it('delivers each key once', async () => {
    const notifier = fakeNotifier(true);
    const sink = new NotificationSink({ enabled: true, notifier, log: capture() });
    expect(await sink.notify(event('failed:2'))).toBe(true);
    for (let i = 0; i < 100; i += 1) {
      expect(await sink.notify(event('failed:2'))).toBe(false);
    }
    expect(notifier.sent).toHaveLength(1);
  });

  it('stays quiet when disabled', async () => {
    const notifier = fakeNotifier(true);
    const log = capture();
    const sink = new NotificationSink({ enabled: false, notifier, log });
    await sink.notify(event('failed:2'));
    expect(notifier.sent).toEqual([]);
    expect(log.lines).toEqual([]);
  });

  it('prints when no desktop mechanism is available', async () => {
    const notifier = fakeNotifier(false);
    const log = capture();
    const sink = new NotificationSink({ enabled: true, notifier, log });
    await sink.notify(event('failed:2'));
    await sink.notify(event('failed:3'));
    expect(notifier.sent).toHaveLength(1);
    expect(log.lines).toEqual([
      'snakemake: b failed: job 2 (b) failed',
      'snakemake: b failed: job 2 (b) failed',
    ]);
  });
});

describe('failure notifications across ticks', () => {
  it('fires exactly once for an unchanged failure over 100 ticks', async () => {
    const records = toRecords(
      'snakemake.log',
      ['rule b:', '    jobid: 2', 'Submitted job 2', 'Error in rule b:', '    jobid: 2'].join('\n'),
    );
    const parser = createSnakemakeParser();
    const notifier = fakeNotifier(true);
    const sink = new NotificationSink({ enabled: true, notifier, log: capture() });
    let model = ProgressModel.start(0);
    for (let tick = 0; tick < 101; tick += 1) {
      const step = model.apply(parser.parse(records), tick * 1000);
      model = step.model;
      for (const e of deriveNotifications('snakemake', step.transitions)) {
        await sink.notify(e);
      }
    }
    expect(notifier.sent).toEqual([
      {
        key: 'failed:2',
        title: 'snakemake: b failed',
        message: 'job 2 (b) failed',
        urgency: 'critical',
      },
    ]);
  });
});
