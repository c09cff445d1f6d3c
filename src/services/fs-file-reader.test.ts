import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, mkdir, rm, symlink, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FsFileReader } from './fs-file-reader.js';

describe('FsFileReader', () => {
  const reader = new FsFileReader();
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'secrets-watch-'));
    await writeFile(join(dir, 'api-token'), 'placeholder-token');
    await mkdir(join(dir, 'nested'));
    await symlink(join(dir, 'api-token'), join(dir, 'token-link'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read file content as bytes', async () => {
    const content = await reader.readFile(join(dir, 'api-token'));

    expect(content.toString('utf-8')).toBe('placeholder-token');
  });

  it('should tell files from directories', async () => {
    expect((await reader.stat(join(dir, 'api-token'))).isFile()).toBe(true);
    expect((await reader.stat(join(dir, 'nested'))).isFile()).toBe(false);
  });

  it('should describe directory entries', async () => {
    const entries = await reader.readDir(dir);
    const byName = new Map(entries.map(entry => [entry.name, entry]));

    expect([...byName.keys()].sort()).toEqual(['api-token', 'nested', 'token-link']);
    expect(byName.get('nested')?.isDirectory()).toBe(true);
    expect(byName.get('token-link')?.isSymbolicLink()).toBe(true);
    expect(byName.get('api-token')?.isFile()).toBe(true);
  });

  it('should report a missing file with its system code', async () => {
    await expect(reader.readFile(join(dir, 'missing'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
