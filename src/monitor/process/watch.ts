// src/monitor/process/watch.ts
import { spawn } from 'node:child_process';
import { closeSync, openSync } from 'node:fs';
import path from 'node:path';

import { ensureDirSync } from 'fs-extra';

import { errnoCode } from '@/monitor/errors';

/** A foreground process whose exit ends the monitor. */
export type WatchedProcess = {
  readonly pid: number;
  /** True once the process is known to have exited. */
  exited(): boolean;
  /** Exit code when known (spawned children only); null otherwise. */
  exitCode(): number | null;
};

/**
 * Signal-0 liveness probe; EPERM still means the pid exists. A zombie (exited
 * but not yet reaped by its parent) also counts as alive.
 */
export const isProcessAlive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    return errnoCode(e) === 'EPERM';
  }
};

/** Watch an existing process by pid (exit code unknowable). */
export const watchPid = (
  pid: number,
  alive: (pid: number) => boolean = isProcessAlive,
): WatchedProcess => {
  let gone = false;
  return {
    pid,
    exited() {
      if (!gone) gone = !alive(pid);
      return gone;
    },
    exitCode() {
      return null;
    },
  };
};

/**
 * Spawn the workflow command through the shell and watch it.
 * Output goes straight to `outFile` (fd handoff, no pipes), so the child
 * survives the monitor exiting.
 */
export const spawnWatched = (args: {
  command: string;
  cwd: string;
  outFile: string;
}): WatchedProcess => {
  ensureDirSync(path.dirname(args.outFile));
  const fd = openSync(args.outFile, 'a');
  const child = spawn(args.command, {
    cwd: args.cwd,
    shell: true,
    windowsHide: true,
    stdio: ['ignore', fd, fd],
  });
  closeSync(fd);
  // The workflow outlives a cancelled monitor.
  child.unref();
  let done = false;
  let code: number | null = null;
  child.on('exit', (c, signal) => {
    done = true;
    code = c ?? (signal ? 128 : null);
  });
  child.on('error', () => {
    done = true;
    code = 127;
  });
  if (typeof child.pid !== 'number') {
    throw new Error(`failed to start: ${args.command}`);
  }
  const pid = child.pid;
  return {
    pid,
    exited: () => done,
    exitCode: () => code,
  };
};
