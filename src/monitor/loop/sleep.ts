// src/monitor/loop/sleep.ts
import { setTimeout as delay } from 'node:timers/promises';

/**
 * Wait `ms` unless `signal` aborts first.
 * Resolves true after a full sleep, false when cut short.
 */
export const sleep = async (ms: number, signal?: AbortSignal): Promise<boolean> => {
  if (signal?.aborted) return false;
  try {
    await delay(ms, undefined, signal ? { signal } : undefined);
    return true;
  } catch (e) {
    if (signal?.aborted) return false;
    throw e;
  }
};
