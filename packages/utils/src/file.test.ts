import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { readTextFile, safeWriteFile } from './file.js';

describe('file operations', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'metadata-check-file-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read the whole file as text', async () => {
    const path = join(dir, 'in.csv');
    await writeFile(path, 'filename,title\na.tif,T\n', 'utf8');

    expect(await readTextFile(path)).toBe('filename,title\na.tif,T\n');
  });

  it('should reject when the file does not exist', async () => {
    await expect(readTextFile(join(dir, 'missing.csv'))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('should create parent directories when writing', async () => {
    const path = join(dir, 'nested', 'out', 'report.csv');
    await safeWriteFile(path, 'a,b\n');

    expect(await readFile(path, 'utf8')).toBe('a,b\n');
  });
});
