import { readFile, rename } from 'fs/promises';
import { z } from 'zod';
import {
  CorruptStateError,
  StateAccessError,
  UsageError,
  WriteQueue,
  atomicWriteJson,
  systemErrorCode,
  type Logger,
} from '@kiln/shared';

const ACCESS_DENIED = new Set(['EACCES', 'EPERM']);

const count = z.number().int().nonnegative().default(0);
const samples = z.array(z.number().nonnegative()).default([]);

/**
 * On-disk shape of metrics.json. Field names are snake_case so existing files stay readable.
 */
export const HistoricalMetricsSchema = z.object({
  total_builds: count,
  total_tests: count,
  total_errors: count,
  /** Build durations in seconds, oldest first */
  build_times: samples,
  /** Test durations in seconds, oldest first */
  test_times: samples,
  last_success: z
    .string()
    .nullish()
    .transform((value) => value ?? undefined),
});

export type HistoricalMetrics = z.output<typeof HistoricalMetricsSchema>;

export type MetricKind = 'build' | 'test';

export type MetricsLoadResult =
  | { status: 'loaded' }
  | { status: 'absent' }
  | { status: 'corrupt'; error: CorruptStateError; backupPath: string };

export function emptyMetrics(): HistoricalMetrics {
  return {
    total_builds: 0,
    total_tests: 0,
    total_errors: 0,
    build_times: [],
    test_times: [],
    last_success: undefined,
  };
}

export interface MetricsStoreOptions {
  path: string;
  logger?: Logger;
  sessionId?: string;
  now?: () => Date;
}

/**
 * Cross-session counters and duration samples, persisted as JSON.
 */
export class MetricsStore {
  private data: HistoricalMetrics = emptyMetrics();
  private readonly queue = new WriteQueue();
  private readonly now: () => Date;

  constructor(private readonly options: MetricsStoreOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get path(): string {
    return this.options.path;
  }

  /**
   * Replaces the in-memory metrics with the persisted ones. Missing or unreadable
   * files leave defaults in place; an unreadable file is moved aside first.
   */
  async load(): Promise<MetricsLoadResult> {
    const { path } = this.options;

    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (error) {
      const code = systemErrorCode(error);
      if (code === 'ENOENT') {
        this.data = emptyMetrics();
        return { status: 'absent' };
      }
      if (code && ACCESS_DENIED.has(code)) {
        throw new StateAccessError(path, `Permission denied reading metrics file ${path}`, {
          cause: error,
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      return this.recoverCorrupt(message, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return this.recoverCorrupt(`invalid JSON (${message})`, error);
    }

    const result = HistoricalMetricsSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      return this.recoverCorrupt(`unexpected content (${issues})`, result.error);
    }

    this.data = result.data;
    return { status: 'loaded' };
  }

  private async recoverCorrupt(reason: string, cause: unknown): Promise<MetricsLoadResult> {
    const { path, logger, sessionId } = this.options;
    const error = new CorruptStateError(path, `Metrics file ${path} is unreadable: ${reason}`, {
      cause,
    });
    const stamp = this.now().toISOString().replace(/[:.]/g, '-');
    const backupPath = `${path}.corrupt-${stamp}`;

    try {
      await rename(path, backupPath);
    } catch (renameError) {
      const code = systemErrorCode(renameError);
      if (code && ACCESS_DENIED.has(code)) {
        throw new StateAccessError(path, `Permission denied moving aside ${path}`, {
          cause: renameError,
        });
      }
      throw renameError;
    }

    this.data = emptyMetrics();
    logger?.warn(`${error.message}; starting from defaults (previous file kept at ${backupPath})`);
    logger?.log({
      type: 'StateRecovered',
      schemaVersion: 1,
      timestamp: this.now().toISOString(),
      sessionId: sessionId ?? 'unknown',
      payload: { path, backupPath, reason },
    });
    return { status: 'corrupt', error, backupPath };
  }

  /**
   * Writes the current metrics atomically. Concurrent calls are serialized.
   */
  save(): Promise<void> {
    const { path } = this.options;
    return this.queue.enqueue(async () => {
      try {
        await atomicWriteJson(path, this.snapshot());
      } catch (error) {
        const code = systemErrorCode(error);
        if (code && ACCESS_DENIED.has(code)) {
          throw new StateAccessError(path, `Permission denied writing metrics file ${path}`, {
            cause: error,
          });
        }
        throw error;
      }
    });
  }

  /** Resolves once every save queued so far has settled. */
  flush(): Promise<void> {
    return this.queue.drain();
  }

  recordBuild(seconds: number): void {
    assertDuration(seconds);
    this.data.total_builds++;
    this.data.build_times.push(seconds);
    this.data.last_success = this.now().toISOString();
  }

  recordTest(seconds: number): void {
    assertDuration(seconds);
    this.data.total_tests++;
    this.data.test_times.push(seconds);
  }

  recordError(): void {
    this.data.total_errors++;
  }

  /**
   * Mean of the last `n` samples, or undefined when there are none.
   */
  rollingAverage(kind: MetricKind, n: number): number | undefined {
    if (!Number.isInteger(n) || n < 1) {
      throw new UsageError(`Rolling average window must be a positive integer, got ${n}`);
    }
    const times = kind === 'build' ? this.data.build_times : this.data.test_times;
    if (times.length === 0) {
      return undefined;
    }
    const window = times.slice(-n);
    return window.reduce((sum, value) => sum + value, 0) / window.length;
  }

  snapshot(): HistoricalMetrics {
    return {
      ...this.data,
      build_times: [...this.data.build_times],
      test_times: [...this.data.test_times],
    };
  }

  /** Clears every counter and sample. Only an explicit clean request does this. */
  reset(): void {
    this.data = emptyMetrics();
  }
}

function assertDuration(seconds: number): void {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new UsageError(`Duration must be a non-negative number of seconds, got ${seconds}`);
  }
}
