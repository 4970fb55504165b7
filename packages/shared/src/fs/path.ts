import path from 'node:path';
import os from 'node:os';
import { readFileSync } from 'node:fs';

/**
 * Resolves a configured path against the project root. Absolute paths are kept as they are.
 */
export function resolveFrom(root: string, p: string): string {
  return path.isAbsolute(p) ? p : path.join(root, p);
}

/**
 * Checks if the current environment is Windows.
 */
export function isWindows(): boolean {
  return os.platform() === 'win32';
}

/**
 * Checks if the current environment is WSL (Windows Subsystem for Linux),
 * by looking for 'Microsoft' in /proc/version.
 */
export function isWSL(): boolean {
  try {
    if (os.platform() !== 'linux') {
      return false;
    }
    const version = readFileSync('/proc/version', 'utf8');
    return /microsoft/i.test(version);
  } catch {
    return false;
  }
}

/**
 * Short human-readable platform description for diagnostics.
 */
export function describePlatform(): string {
  if (isWSL()) return `${process.platform} (WSL)`;
  return `${process.platform} ${os.arch()}`;
}
