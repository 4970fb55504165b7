import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { stat } from 'fs/promises';

/**
 * Hex-encoded SHA-256 digest of an in-memory buffer.
 */
export function sha256(data: Buffer | string): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Streams a file through SHA-256 and returns the lowercase hex digest.
 */
export function sha256File(path: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('sha256');
    const stream = createReadStream(path);
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('error', reject);
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}

export interface FileFingerprint {
  sizeBytes: number;
  sha256: string;
}

export async function fingerprintFile(path: string): Promise<FileFingerprint> {
  const info = await stat(path);
  return { sizeBytes: info.size, sha256: await sha256File(path) };
}
