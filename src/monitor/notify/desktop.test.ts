import { describe, expect, it } from 'vitest';

import { CommandSpawnError, type RunCommand } from '@/monitor/process/exec';
import type { NotificationEvent } from '@/monitor/types';

import { createDesktopNotifier, desktopCommand } from './desktop';

const event: NotificationEvent = {
  key: 'failed:3',
  title: 'snakemake: align failed',
  message: 'say "hi"',
  urgency: 'critical',
};

describe('desktopCommand', () => {
  it('uses notify-send with urgency on linux', () => {
    expect(desktopCommand(event, 'linux')).toEqual({
      command: 'notify-send',
      args: ['-u', 'critical', 'snakemake: align failed', 'say "hi"'],
    });
  });

  it('quotes AppleScript strings on darwin', () => {
    expect(desktopCommand(event, 'darwin')?.args[1]).toBe(
      'display notification "say \\"hi\\"" with title "snakemake: align failed"',
    );
  });

  it('has no mechanism on other platforms', () => {
    expect(desktopCommand(event, 'win32')).toBeUndefined();
  });
});

describe('createDesktopNotifier', () => {
  it('reports delivery by exit code', async () => {
    const seen: string[] = [];
    const run: RunCommand = (command) => {
      seen.push(command);
      return Promise.resolve({ code: 0, stdout: '', stderr: '', timedOut: false });
    };
    await expect(createDesktopNotifier({ run, platform: 'linux' }).send(event)).resolves.toBe(true);
    expect(seen).toEqual(['notify-send']);
  });

  it('reports a missing tool as undelivered', async () => {
    const run: RunCommand = (command) =>
      Promise.reject(new CommandSpawnError(command, new Error('spawn ENOENT')));
    await expect(createDesktopNotifier({ run, platform: 'linux' }).send(event)).resolves.toBe(false);
  });
});
