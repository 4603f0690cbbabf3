// src/monitor/process/resources.ts
import type { ResourceSample } from '@/monitor/types';

import { runCommand, type RunCommand } from './exec';

/**
 * Parse `ps -o %cpu=,rss=` output (rss in KiB).
 * Returns undefined for empty or malformed output.
 */
export const parsePsSample = (
  pid: number,
  text: string,
): ResourceSample | undefined => {
  const fields = text.trim().split(/\s+/);
  if (fields.length < 2) return undefined;
  const cpu = Number.parseFloat(fields[0] ?? '');
  const rssKb = Number.parseInt(fields[1] ?? '', 10);
  if (!Number.isFinite(cpu) || !Number.isFinite(rssKb)) return undefined;
  return { pid, cpuPercent: cpu, rssBytes: rssKb * 1024 };
};

export type ResourceSampler = (pid: number) => Promise<ResourceSample | undefined>;

/** Point-in-time CPU/RSS sample through `ps`; undefined when the process is gone. */
export const createPsSampler =
  (run: RunCommand = runCommand): ResourceSampler =>
  async (pid) => {
    try {
      const res = await run('ps', ['-o', '%cpu=,rss=', '-p', String(pid)], {
        timeoutMs: 5000,
      });
      if (res.code !== 0) return undefined;
      return parsePsSample(pid, res.stdout);
    } catch {
      // no ps on this host; the dashboard simply omits the resource line
      return undefined;
    }
  };
