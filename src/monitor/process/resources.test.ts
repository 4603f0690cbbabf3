import { describe, expect, it } from 'vitest';

import type { RunCommand } from './exec';
import { createPsSampler, parsePsSample } from './resources';

describe('parsePsSample', () => {
  it('reads cpu percent and rss in KiB', () => {
    expect(parsePsSample(42, '  3.5 2048\n')).toEqual({ pid: 42, cpuPercent: 3.5, rssBytes: 2048 * 1024 });
  });

  it('rejects empty or malformed output', () => {
    expect(parsePsSample(42, '')).toBeUndefined();
    expect(parsePsSample(42, 'n/a lots')).toBeUndefined();
  });
});

describe('createPsSampler', () => {
  it('queries ps for the pid', async () => {
    const calls: string[][] = [];
    const run: RunCommand = (command, args) => {
      calls.push([command, ...args]);
      return Promise.resolve({ code: 0, stdout: '0.0 512\n', stderr: '', timedOut: false });
    };
    expect(await createPsSampler(run)(7)).toEqual({ pid: 7, cpuPercent: 0, rssBytes: 512 * 1024 });
    expect(calls).toEqual([['ps', '-o', '%cpu=,rss=', '-p', '7']]);
  });

  it('returns undefined once the process is gone', async () => {
    const run: RunCommand = () =>
      Promise.resolve({ code: 1, stdout: '', stderr: '', timedOut: false });
    expect(await createPsSampler(run)(7)).toBeUndefined();
  });
});
