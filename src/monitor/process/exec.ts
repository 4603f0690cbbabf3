// src/monitor/process/exec.ts
import { spawn } from 'node:child_process';

import treeKill from 'tree-kill';

export type CommandResult = {
  /** null when killed by a signal (including our own timeout). */
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

/** Raised only when the executable could not be started at all (e.g. ENOENT). */
export class CommandSpawnError extends Error {
  readonly command: string;
  constructor(command: string, cause: unknown) {
    super(
      `cannot run ${command}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = 'CommandSpawnError';
    this.command = command;
  }
}

export type RunCommand = (
  command: string,
  args: readonly string[],
  opts?: { timeoutMs?: number; cwd?: string },
) => Promise<CommandResult>;

/**
 * Run an executable (no shell) and capture its output.
 * A run exceeding `timeoutMs` is tree-killed and resolves with timedOut=true.
 */
export const runCommand: RunCommand = (command, args, opts) =>
  new Promise<CommandResult>((resolveP, rejectP) => {
    const child = spawn(command, [...args], {
      cwd: opts?.cwd,
      windowsHide: true,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    child.stdout.on('data', (d: Buffer) => {
      stdout += d.toString('utf8');
    });
    child.stderr.on('data', (d: Buffer) => {
      stderr += d.toString('utf8');
    });

    if (typeof opts?.timeoutMs === 'number' && opts.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        if (typeof child.pid === 'number') treeKill(child.pid, 'SIGKILL');
      }, opts.timeoutMs);
    }

    child.on('error', (e) => {
      if (timer) clearTimeout(timer);
      if (settled) return;
      settled = true;
      rejectP(new CommandSpawnError(command, e));
    });
    child.on('close', (code) => {
      if (timer) clearTimeout(timer);
      if (settled) return;
      settled = true;
      resolveP({ code, stdout, stderr, timedOut });
    });
  });
