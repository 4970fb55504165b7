// packages/shared/src/artifacts/manifest.ts
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { atomicWriteJson } from '../fs/io';

export const MANIFEST_FILENAME = 'manifest.json';

export const DistributionManifestSchema = z.object({
  name: z.string(),
  version: z.string(),
  profile: z.string(),
  /** ISO-8601 build timestamp */
  build_date: z.string().datetime(),
  binary_hash: z.string().regex(/^[0-9a-f]{64}$/, 'binary_hash must be 64 lowercase hex characters'),
  binary_size: z.number().int().nonnegative(),
});

export type DistributionManifest = z.infer<typeof DistributionManifestSchema>;

export async function writeManifest(path: string, manifest: DistributionManifest): Promise<void> {
  await atomicWriteJson(path, DistributionManifestSchema.parse(manifest));
}

export async function readManifest(path: string): Promise<DistributionManifest> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
  return DistributionManifestSchema.parse(raw);
}
