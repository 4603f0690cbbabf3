/* src/cli/config/load.ts
 * Resolve monitor settings: flag > environment > wfmon.config.* > defaults.
 */
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { ZodError } from 'zod';

import { CONFIG_FILE_NAMES, parseConfigText } from '@/common/config/parse';
import type { EngineDefaults } from '@/monitor/engines';
import { errorMessage, UsageError } from '@/monitor/errors';
import { debugTrace } from '@/util/debug';
import { DBG_SCOPE_CONFIG } from '@/util/debug-scopes';

import { type EnvConfig, envSchema, type FileConfig, fileConfigSchema } from './schema';

export type MonitorSettings = {
  intervalSec: number;
  notify: boolean;
  stateDir: string;
  barWidth: number;
  recentLines: number;
  startupRetries: number;
  startupRetryDelayMs: number;
  commandTimeoutMs: number;
  engines: EngineDefaults;
};

export type CliOverrides = { interval?: number; notify?: boolean };

export const DEFAULTS = {
  intervalSec: 10,
  notify: false,
  barWidth: 50,
  recentLines: 5,
  startupRetries: 3,
  startupRetryDelayMs: 1000,
  commandTimeoutMs: 30_000,
} as const;

export const formatZodError = (e: unknown): string =>
  e instanceof ZodError
    ? e.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n')
    : String(e);

export const defaultStateDir = (env: NodeJS.ProcessEnv): string =>
  env.XDG_STATE_HOME
    ? path.join(env.XDG_STATE_HOME, 'wfmon')
    : path.join(os.homedir(), '.local', 'state', 'wfmon');

/** Nearest wfmon.config.* from `cwd` upward. */
export const findConfigPath = (cwd: string): string | undefined => {
  let dir = path.resolve(cwd);
  for (;;) {
    for (const name of CONFIG_FILE_NAMES) {
      const p = path.join(dir, name);
      if (existsSync(p)) return p;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
};

export const loadConfigFile = async (
  cwd: string,
): Promise<{ path?: string; config: FileConfig }> => {
  const p = findConfigPath(cwd);
  if (!p) {
    debugTrace(DBG_SCOPE_CONFIG, `no config file from ${cwd}`);
    return { config: {} };
  }
  let raw: unknown;
  try {
    raw = parseConfigText(p, await readFile(p, 'utf8'));
  } catch (e) {
    throw new UsageError(`cannot parse ${p}: ${errorMessage(e)}`);
  }
  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UsageError(`invalid config ${p}:\n${formatZodError(parsed.error)}`);
  }
  debugTrace(DBG_SCOPE_CONFIG, `loaded ${p}`);
  return { path: p, config: parsed.data };
};

export const readEnvConfig = (env: NodeJS.ProcessEnv): EnvConfig => {
  // Blank values count as unset.
  const pick = (k: string): string | undefined => {
    const v = env[k];
    return typeof v === 'string' && v.trim() !== '' ? v : undefined;
  };
  const parsed = envSchema.safeParse({
    UPDATE_INTERVAL: pick('UPDATE_INTERVAL'),
    ENABLE_NOTIFICATIONS: pick('ENABLE_NOTIFICATIONS'),
    WFMON_STATE_DIR: pick('WFMON_STATE_DIR'),
  });
  if (!parsed.success) {
    throw new UsageError(`invalid environment:\n${formatZodError(parsed.error)}`);
  }
  return parsed.data;
};

export const resolveSettings = async (args: {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  flags?: CliOverrides;
}): Promise<MonitorSettings> => {
  const env = args.env ?? process.env;
  const envCfg = readEnvConfig(env);
  const { config: file } = await loadConfigFile(args.cwd);
  const engines: EngineDefaults = {};
  if (file.engines?.snakemake?.log) engines.snakemakeLog = file.engines.snakemake.log;
  if (file.engines?.nextflow?.log) engines.nextflowLog = file.engines.nextflow.log;
  if (file.engines?.wdl?.dir) engines.wdlDir = file.engines.wdl.dir;
  if (file.engines?.slurm?.user) engines.slurmUser = file.engines.slurm.user;

  return {
    intervalSec:
      args.flags?.interval ?? envCfg.UPDATE_INTERVAL ?? file.interval ?? DEFAULTS.intervalSec,
    notify:
      args.flags?.notify ?? envCfg.ENABLE_NOTIFICATIONS ?? file.notify ?? DEFAULTS.notify,
    stateDir: path.resolve(
      args.cwd,
      envCfg.WFMON_STATE_DIR ?? file.stateDir ?? defaultStateDir(env),
    ),
    barWidth: file.barWidth ?? DEFAULTS.barWidth,
    recentLines: file.recentLines ?? DEFAULTS.recentLines,
    startupRetries: file.startupRetries ?? DEFAULTS.startupRetries,
    startupRetryDelayMs: file.startupRetryDelayMs ?? DEFAULTS.startupRetryDelayMs,
    commandTimeoutMs: file.commandTimeoutMs ?? DEFAULTS.commandTimeoutMs,
    engines,
  };
};
