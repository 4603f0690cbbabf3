import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { attachTermination } from './signals';

describe('attachTermination', () => {
  const detachers: (() => void)[] = [];
  // The runner's own handlers stay off while signals are emitted here.
  let saved: NodeJS.SignalsListener[] = [];
  beforeEach(() => {
    saved = process.listeners('SIGTERM');
    process.removeAllListeners('SIGTERM');
  });
  afterEach(() => {
    for (const d of detachers.splice(0)) d();
    for (const l of saved) process.on('SIGTERM', l);
  });

  it('aborts with the signal name and detaches after the first signal', () => {
    const before = {
      SIGINT: process.listenerCount('SIGINT'),
      SIGTERM: 0,
    };
    const controller = new AbortController();
    detachers.push(attachTermination(controller));
    expect(process.listenerCount('SIGTERM')).toBe(before.SIGTERM + 1);
    expect(process.listenerCount('SIGINT')).toBe(before.SIGINT + 1);

    process.emit('SIGTERM', 'SIGTERM');

    expect(controller.signal.aborted).toBe(true);
    expect(controller.signal.reason).toBe('SIGTERM');
    expect(process.listenerCount('SIGTERM')).toBe(before.SIGTERM);
    expect(process.listenerCount('SIGINT')).toBe(before.SIGINT);
  });

  it('leaves no listeners behind when detached without a signal', () => {
    const before = process.listenerCount('SIGINT');
    const controller = new AbortController();
    attachTermination(controller)();
    expect(process.listenerCount('SIGINT')).toBe(before);
    expect(controller.signal.aborted).toBe(false);
  });
});
