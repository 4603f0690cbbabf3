import { describe, expect, it } from 'vitest';

import { sleep } from './sleep';

describe('sleep', () => {
  it('completes a full wait', async () => {
    await expect(sleep(5)).resolves.toBe(true);
  });

  it('returns early when aborted', async () => {
    const controller = new AbortController();
    const started = Date.now();
    setTimeout(() => controller.abort(), 20);
    await expect(sleep(60_000, controller.signal)).resolves.toBe(false);
    expect(Date.now() - started).toBeLessThan(5000);
  });

  it('does not wait when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(60_000, controller.signal)).resolves.toBe(false);
  });
});
