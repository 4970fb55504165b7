// packages/shared/src/fs/io.ts
import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir } from 'fs-extra';

/**
 * Ensures the parent directory of `path` exists.
 */
export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/**
 * Writes `content` to a temporary file next to `path` and renames it into place,
 * so readers see either the previous file or the complete new one.
 */
export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureDir(path);
  const tempPath = await tmpName({ dir: dirname(path), prefix: '.kiln-' });
  try {
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export async function atomicWriteJson(path: string, value: unknown): Promise<void> {
  await atomicWrite(path, JSON.stringify(value, null, 2) + '\n');
}
