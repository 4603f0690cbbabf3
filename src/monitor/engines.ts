/* src/monitor/engines.ts
 * Per-engine source and parser selection (default log locations, scheduler
 * query construction).
 */
import { stat } from 'node:fs/promises';
import path from 'node:path';

import fg from 'fast-glob';

import { errnoCode, UsageError } from '@/monitor/errors';
import { pad2 } from '@/monitor/format';
import {
  createNextflowParser,
  createSlurmParser,
  createSnakemakeParser,
  createWdlParser,
  type EventParser,
  SACCT_FORMAT,
} from '@/monitor/parser';
import type { RunCommand } from '@/monitor/process/exec';
import {
  CommandSource,
  DirectorySource,
  type LogSource,
  TailSource,
} from '@/monitor/source';
import type { EngineKind } from '@/monitor/types';

export const DEFAULT_SNAKEMAKE_LOG = 'logs/snakemake.log';
export const DEFAULT_NEXTFLOW_LOG = '.nextflow.log';
export const DEFAULT_WDL_DIR = 'cromwell-workflow-logs';

export type EngineDefaults = {
  snakemakeLog?: string;
  nextflowLog?: string;
  wdlDir?: string;
  slurmUser?: string;
};

export type EngineRequest = {
  engine: EngineKind;
  /** Positional selector: log path, directory or job list. */
  selector?: string;
  cwd: string;
  /** Nextflow run name (`.nextflow.log.<name>`). */
  run?: string;
  /** SLURM user when no job list is given. */
  user?: string;
  /** Output file of an `--exec` command; becomes the Snakemake log when none is named. */
  execOutput?: string;
  defaults: EngineDefaults;
  commandTimeoutMs: number;
  startedAt: Date;
  runCommand?: RunCommand;
};

export type EnginePlan = { source: LogSource; parser: EventParser };

const isFile = async (p: string): Promise<boolean | undefined> => {
  try {
    return (await stat(p)).isFile();
  } catch (e) {
    if (errnoCode(e) === 'ENOENT') return undefined;
    throw e;
  }
};

/** Newest `.snakemake/log/*.snakemake.log` under cwd, if any. */
export const newestSnakemakeLog = async (cwd: string): Promise<string | undefined> => {
  const entries = await fg('.snakemake/log/*.snakemake.log', {
    cwd,
    absolute: true,
    onlyFiles: true,
    dot: true,
    stats: true,
  });
  let best: { path: string; mtime: number } | undefined;
  for (const e of entries) {
    const mtime = e.stats?.mtimeMs ?? 0;
    if (!best || mtime > best.mtime) best = { path: e.path, mtime };
  }
  return best?.path;
};

export const resolveSnakemakeLog = async (req: EngineRequest): Promise<string> => {
  const named = req.selector ?? req.defaults.snakemakeLog;
  if (named) return path.resolve(req.cwd, named);
  if (req.execOutput) return req.execOutput;
  const fallback = path.resolve(req.cwd, DEFAULT_SNAKEMAKE_LOG);
  if (await isFile(fallback)) return fallback;
  return (await newestSnakemakeLog(req.cwd)) ?? fallback;
};

export const resolveNextflowLog = (req: EngineRequest): string => {
  if (req.selector) return path.resolve(req.cwd, req.selector);
  const base = req.defaults.nextflowLog ?? DEFAULT_NEXTFLOW_LOG;
  return path.resolve(req.cwd, req.run ? `${base}.${req.run}` : base);
};

const JOB_LIST = /^\d+(?:_\d+)?(?:,\d+(?:_\d+)?)*$/;

export const parseJobList = (selector: string): string[] => {
  const compact = selector.replace(/\s+/g, '');
  if (!JOB_LIST.test(compact)) {
    throw new UsageError(`invalid job list "${selector}" (expected ids like 101,102)`);
  }
  return Array.from(new Set(compact.split(',')));
};

/** `sacct -S` takes local time without a zone. */
export const sacctTime = (d: Date): string =>
  `${d.getFullYear().toString()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}` +
  `T${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;

export const sacctArgs = (
  sel: { jobs: readonly string[] } | { user: string; since: Date },
): string[] => {
  const base = ['-n', '-P', '-X', '-o', SACCT_FORMAT];
  return 'jobs' in sel
    ? [...base, '-j', sel.jobs.join(',')]
    : [...base, '-u', sel.user, '-S', sacctTime(sel.since)];
};

export const planEngine = async (req: EngineRequest): Promise<EnginePlan> => {
  switch (req.engine) {
    case 'snakemake':
      return {
        source: new TailSource(await resolveSnakemakeLog(req)),
        parser: createSnakemakeParser(),
      };
    case 'nextflow':
      return {
        source: new TailSource(resolveNextflowLog(req)),
        parser: createNextflowParser(),
      };
    case 'wdl': {
      const target = path.resolve(req.cwd, req.selector ?? req.defaults.wdlDir ?? DEFAULT_WDL_DIR);
      const single = (await isFile(target)) ?? target.endsWith('.log');
      return {
        source: new DirectorySource(target),
        parser: createWdlParser({ single }),
      };
    }
    case 'slurm': {
      const common = {
        command: 'sacct',
        timeoutMs: req.commandTimeoutMs,
        ...(req.runCommand ? { run: req.runCommand } : {}),
      };
      if (req.selector) {
        const jobs = parseJobList(req.selector);
        return {
          source: new CommandSource({
            ...common,
            id: `jobs:${jobs.join(',')}`,
            args: sacctArgs({ jobs }),
          }),
          parser: createSlurmParser({ expect: jobs }),
        };
      }
      const user = req.user ?? req.defaults.slurmUser ?? process.env.USER;
      if (!user) {
        throw new UsageError('slurm: give a job list or --user (USER is not set)');
      }
      return {
        source: new CommandSource({
          ...common,
          id: `user:${user}`,
          args: sacctArgs({ user, since: req.startedAt }),
        }),
        parser: createSlurmParser(),
      };
    }
  }
};
