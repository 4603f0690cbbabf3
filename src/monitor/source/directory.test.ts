import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DirectorySource } from './directory';

describe('DirectorySource', () => {
  let dir: string;
  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'wfmon-dir-'));
  });
  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads each matching log as its own origin', async () => {
    await writeFile(path.join(dir, 'b.log'), 'second\n', 'utf8');
    await writeFile(path.join(dir, 'a.log'), 'first\n', 'utf8');
    await writeFile(path.join(dir, 'notes.txt'), 'ignored\n', 'utf8');
    await writeFile(path.join(dir, 'empty.log'), '', 'utf8');

    const records = await new DirectorySource(dir).read();
    expect(records).toEqual([
      { origin: path.join(dir, 'a.log'), text: 'first' },
      { origin: path.join(dir, 'b.log'), text: 'second' },
      { origin: path.join(dir, 'empty.log'), text: '' },
    ]);
  });

  it('reads a single file path', async () => {
    const file = path.join(dir, 'wf.log');
    await writeFile(file, 'x\n', 'utf8');
    expect(await new DirectorySource(file).read()).toEqual([{ origin: file, text: 'x' }]);
  });

  it('reports a missing directory', async () => {
    const missing = path.join(dir, 'nope');
    await expect(new DirectorySource(missing).read()).rejects.toThrow(
      `${missing}: log directory not found`,
    );
  });
});
