import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { CommanderError } from 'commander';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { makeCli } from '@/cli/index';

describe('makeCli', () => {
  let dir: string;
  const envBackup = { ...process.env };

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'wfmon-cli-'));
    process.env.WFMON_STATE_DIR = dir;
  });
  afterEach(async () => {
    process.env = { ...envBackup };
    process.exitCode = undefined;
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('registers the engine monitors and control commands', () => {
    expect(makeCli().commands.map((c) => c.name())).toEqual([
      'snakemake',
      'nextflow',
      'wdl',
      'slurm',
      'status',
      'stop',
    ]);
  });

  it('sets exit code 1 when stop finds no monitor', async () => {
    const errors: string[] = [];
    vi.spyOn(console, 'error').mockImplementation((msg: unknown) => {
      errors.push(String(msg));
    });
    await makeCli().parseAsync(['node', 'wfmon', 'stop', 'slurm']);
    expect(process.exitCode).toBe(1);
    expect(errors).toEqual([`wfmon: warning: no slurm monitor state in ${dir}`]);
  });

  it('rejects a non-positive interval with exit code 2', async () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    await expect(
      makeCli().parseAsync(['node', 'wfmon', 'snakemake', '-i', '0']),
    ).rejects.toBeInstanceOf(CommanderError);
    expect(process.exitCode).toBe(2);
  });

  it('rejects an unknown engine for stop', async () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    await expect(makeCli().parseAsync(['node', 'wfmon', 'stop', 'make'])).rejects.toBeInstanceOf(
      CommanderError,
    );
    expect(process.exitCode).toBe(2);
  });

  it('prints the version', async () => {
    const out: string[] = [];
    vi.spyOn(console, 'log').mockImplementation((msg: unknown) => {
      out.push(String(msg));
    });
    await makeCli().parseAsync(['node', 'wfmon', '--version']);
    expect(out).toEqual(['wfmon 0.1.0']);
  });
});
