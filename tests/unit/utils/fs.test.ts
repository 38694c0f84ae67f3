import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { isNotFound, readFileIfExists, writeFileAtomic } from '../../../src/utils/fs.js';

describe('fs utils', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'skillport-fs-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes atomically, creating parent directories', async () => {
    const file = join(dir, 'nested', 'doc.json');
    await writeFileAtomic(file, '{"a":1}');

    expect(await readFile(file, 'utf-8')).toBe('{"a":1}');
    expect(await readdir(join(dir, 'nested'))).toEqual(['doc.json']);
  });

  it('overwrites existing content', async () => {
    const file = join(dir, 'doc.txt');
    await writeFileAtomic(file, 'one');
    await writeFileAtomic(file, 'two');
    expect(await readFile(file, 'utf-8')).toBe('two');
  });

  it('reads undefined for a missing file', async () => {
    expect(await readFileIfExists(join(dir, 'absent'))).toBeUndefined();
  });

  it('recognises ENOENT errors only', async () => {
    const error = await readFile(join(dir, 'absent')).catch((caught: unknown) => caught);
    expect(isNotFound(error)).toBe(true);
    expect(isNotFound(new Error('other'))).toBe(false);
  });
});
