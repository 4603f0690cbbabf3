/* src/monitor/state/store.ts
 * Persisted monitor state: one key=value file per engine, safe to `source`.
 * Advisory only; it is never read back to resume a monitor.
 */
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { ensureDir, move, remove } from 'fs-extra';
import { z } from 'zod';

import { errnoCode } from '@/monitor/errors';
import { ENGINE_KINDS, type EngineKind, type ProgressSnapshot } from '@/monitor/types';
import { debugTrace } from '@/util/debug';
import { DBG_SCOPE_STATE } from '@/util/debug-scopes';

const count = z.coerce.number().int().nonnegative();

const stateSchema = z.object({
  timestamp: z.coerce.number().int(),
  engine: z.enum(['snakemake', 'nextflow', 'wdl', 'slurm']),
  source: z.string(),
  pid: z.coerce.number().int().positive(),
  started: z.coerce.number().int(),
  total: count,
  pending: count,
  running: count,
  completed: count,
  failed: count,
  percent: count.max(100),
  last_update: z.string(),
});

export type MonitorState = z.infer<typeof stateSchema>;

const KEYS = [
  'timestamp',
  'engine',
  'source',
  'pid',
  'started',
  'total',
  'pending',
  'running',
  'completed',
  'failed',
  'percent',
  'last_update',
] as const satisfies readonly (keyof MonitorState)[];

export const STATE_SUFFIX = '_monitor.state';

export const statePath = (stateDir: string, engine: EngineKind): string =>
  path.join(stateDir, `${engine}${STATE_SUFFIX}`);

export const engineOfStateFile = (file: string): EngineKind | undefined => {
  const base = path.basename(file);
  return ENGINE_KINDS.find((e) => base === `${e}${STATE_SUFFIX}`);
};

export const toMonitorState = (args: {
  engine: EngineKind;
  source: string;
  pid: number;
  startedAt: number;
  snapshot: ProgressSnapshot;
}): MonitorState => {
  const s = args.snapshot;
  return {
    timestamp: Math.floor(s.at / 1000),
    engine: args.engine,
    source: args.source,
    pid: args.pid,
    started: Math.floor(args.startedAt / 1000),
    total: s.total,
    pending: s.counts.pending,
    running: s.counts.running,
    completed: s.counts.completed,
    failed: s.counts.failed,
    percent: s.percent,
    last_update: new Date(s.at).toISOString(),
  };
};

/** POSIX single quotes unless every character is shell-safe. */
export const shellQuote = (v: string): string =>
  /^[A-Za-z0-9_./:@-]*$/.test(v) ? v : `'${v.replace(/'/g, `'\\''`)}'`;

const shellUnquote = (v: string): string => {
  let out = '';
  let i = 0;
  while (i < v.length) {
    const ch = v.charAt(i);
    if (ch === "'") {
      const end = v.indexOf("'", i + 1);
      if (end < 0) return out + v.slice(i + 1);
      out += v.slice(i + 1, end);
      i = end + 1;
    } else if (ch === '\\' && i + 1 < v.length) {
      out += v.charAt(i + 1);
      i += 2;
    } else {
      out += ch;
      i += 1;
    }
  }
  return out;
};

export const serializeState = (state: MonitorState): string =>
  [
    `# ${state.engine} monitor state`,
    ...KEYS.map((k) => `${k}=${shellQuote(String(state[k]))}`),
    '',
  ].join('\n');

/** Parse and validate; throws with every issue listed when invalid. */
export const parseState = (text: string): MonitorState => {
  const raw: Record<string, string> = {};
  for (const line of text.split(/\r?\n/)) {
    const m = /^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/.exec(line.trim());
    if (!m?.[1]) continue;
    raw[m[1]] = shellUnquote(m[2] ?? '');
  }
  const parsed = stateSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      parsed.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; '),
    );
  }
  return parsed.data;
};

/** Undefined when the file does not exist. */
export const readState = async (file: string): Promise<MonitorState | undefined> => {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (e) {
    if (errnoCode(e) === 'ENOENT') return undefined;
    throw e;
  }
  return parseState(text);
};

/** Write through a temp file so readers never see a partial state. */
export const writeState = async (file: string, state: MonitorState): Promise<void> => {
  await ensureDir(path.dirname(file));
  const tmp = `${file}.${process.pid.toString()}.tmp`;
  await writeFile(tmp, serializeState(state), 'utf8');
  await move(tmp, file, { overwrite: true });
  debugTrace(DBG_SCOPE_STATE, `wrote ${file}`);
};

export const removeState = async (file: string): Promise<void> => {
  await remove(file);
  debugTrace(DBG_SCOPE_STATE, `removed ${file}`);
};
