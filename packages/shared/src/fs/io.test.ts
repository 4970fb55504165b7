import * as fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { atomicWrite, atomicWriteJson } from './io';

describe('atomicWrite', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'kiln-io-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('creates parent directories and writes the content', async () => {
    const target = path.join(tmpDir, 'state', 'metrics.json');
    await atomicWrite(target, 'hello');

    expect(await fs.readFile(target, 'utf8')).toBe('hello');
  });

  it('replaces an existing file and leaves no temporary files behind', async () => {
    const target = path.join(tmpDir, 'manifest.json');
    await atomicWrite(target, 'old');
    await atomicWriteJson(target, { name: 'ignite' });

    expect(await fs.readFile(target, 'utf8')).toBe('{\n  "name": "ignite"\n}\n');
    expect(await fs.readdir(tmpDir)).toEqual(['manifest.json']);
  });
});
