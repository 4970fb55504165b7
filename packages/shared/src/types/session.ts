/**
 * In-memory counters for one process session. Created at startup, passed
 * explicitly to the runner, cache and orchestrator, never persisted.
 */
export interface SessionStats {
  readonly sessionId: string;
  readonly startedAt: Date;
  builds: number;
  tests: number;
  checks: number;
  /** Failed external steps (non-zero exit or spawn failure) */
  errors: number;
  /** Warning lines classified across every command */
  warnings: number;
  commandsRun: number;
  cacheHits: number;
  diagnosticsRun: number;
}

export function createSessionStats(sessionId: string, startedAt: Date = new Date()): SessionStats {
  return {
    sessionId,
    startedAt,
    builds: 0,
    tests: 0,
    checks: 0,
    errors: 0,
    warnings: 0,
    commandsRun: 0,
    cacheHits: 0,
    diagnosticsRun: 0,
  };
}

export function sessionDurationMs(stats: SessionStats, now: Date = new Date()): number {
  return Math.max(0, now.getTime() - stats.startedAt.getTime());
}
