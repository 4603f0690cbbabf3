import { appendFile, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { SourceUnavailableError } from '@/monitor/errors';

import { TailSource } from './tail';
import { splitLines } from './types';

describe('splitLines', () => {
  it('drops only the trailing empty line', () => {
    expect(splitLines('a\r\nb\n\nc\n')).toEqual(['a', 'b', '', 'c']);
    expect(splitLines('')).toEqual([]);
  });
});

describe('TailSource', () => {
  let dir: string;
  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'wfmon-tail-'));
  });
  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns the whole file on every read', async () => {
    const file = path.join(dir, 'run.log');
    await writeFile(file, 'one\n', 'utf8');
    const src = new TailSource(file);
    expect((await src.read()).map((r) => r.text)).toEqual(['one']);
    await appendFile(file, 'two\n', 'utf8');
    const records = await src.read();
    expect(records).toEqual([
      { origin: file, text: 'one' },
      { origin: file, text: 'two' },
    ]);
  });

  it('reports a missing file as unavailable', async () => {
    const file = path.join(dir, 'absent.log');
    const err = await new TailSource(file).read().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceUnavailableError);
    expect(err).toHaveProperty('message', `${file}: log file not found`);
  });

  it('reports a directory path', async () => {
    await expect(new TailSource(dir).read()).rejects.toThrow(
      `${dir}: expected a file, found a directory`,
    );
  });
});
