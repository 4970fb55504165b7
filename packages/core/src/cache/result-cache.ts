import { stat, utimes } from 'fs/promises';
import path from 'path';
import { ensureFile, pathExists, remove } from 'fs-extra';
import {
  CACHE_KEY_PATTERN,
  StateAccessError,
  UsageError,
  WriteQueue,
  systemErrorCode,
  type Logger,
  type SessionStats,
} from '@kiln/shared';

/** Markers are live for one hour after they were last touched. */
export const CACHE_TTL_MS = 3600 * 1000;

const ACCESS_DENIED = new Set(['EACCES', 'EPERM']);

export interface ResultCacheOptions {
  /** Directory holding one zero-byte marker per key */
  dir: string;
  session: SessionStats;
  logger?: Logger;
  /** Milliseconds since the epoch */
  now?: () => number;
}

/**
 * TTL cache of prerequisite checks, kept as marker files whose mtime is the
 * touch time. Stale markers are never swept; they simply read as a miss.
 */
export class ResultCache {
  private readonly queue = new WriteQueue();
  private readonly now: () => number;

  constructor(private readonly options: ResultCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  get dir(): string {
    return this.options.dir;
  }

  private markerPath(key: string): string {
    if (!CACHE_KEY_PATTERN.test(key)) {
      throw new UsageError(
        `Invalid cache key "${key}": use letters, digits, ".", "_" and "-", but not "." or ".."`,
      );
    }
    return path.join(this.options.dir, key);
  }

  async check(key: string): Promise<boolean> {
    const marker = this.markerPath(key);

    let mtimeMs: number;
    try {
      const info = await stat(marker);
      if (!info.isFile()) {
        this.options.logger?.warn(`Cache marker ${marker} is not a file; treating as a miss`);
        return false;
      }
      mtimeMs = info.mtimeMs;
    } catch (error) {
      const code = systemErrorCode(error);
      if (code === 'ENOENT') {
        return false;
      }
      if (code && ACCESS_DENIED.has(code)) {
        throw new StateAccessError(marker, `Permission denied reading cache marker ${marker}`, {
          cause: error,
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      this.options.logger?.warn(`Could not read cache marker ${marker}: ${message}`);
      return false;
    }

    if (this.now() - mtimeMs >= CACHE_TTL_MS) {
      this.options.logger?.debug(`Cache marker ${key} is stale`);
      return false;
    }

    const { session, logger } = this.options;
    session.cacheHits++;
    logger?.log({
      type: 'CacheHit',
      schemaVersion: 1,
      timestamp: new Date(this.now()).toISOString(),
      sessionId: session.sessionId,
      payload: { key },
    });
    return true;
  }

  /**
   * Creates the marker or refreshes its touch time.
   */
  set(key: string): Promise<void> {
    const marker = this.markerPath(key);
    return this.queue.enqueue(async () => {
      const touchedAt = new Date(this.now());
      try {
        await ensureFile(marker);
        await utimes(marker, touchedAt, touchedAt);
      } catch (error) {
        throw this.wrapAccess(error, marker, 'writing cache marker');
      }
    });
  }

  /**
   * Removes every marker. Returns whether the cache directory existed.
   */
  invalidateAll(): Promise<boolean> {
    const { dir } = this.options;
    return this.queue.enqueue(async () => {
      try {
        const existed = await pathExists(dir);
        await remove(dir);
        return existed;
      } catch (error) {
        throw this.wrapAccess(error, dir, 'removing cache directory');
      }
    });
  }

  /** Resolves once pending marker writes have settled. */
  flush(): Promise<void> {
    return this.queue.drain();
  }

  private wrapAccess(error: unknown, target: string, action: string): unknown {
    const code = systemErrorCode(error);
    if (code && ACCESS_DENIED.has(code)) {
      return new StateAccessError(target, `Permission denied ${action} ${target}`, {
        cause: error,
      });
    }
    return error;
  }
}
