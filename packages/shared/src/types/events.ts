/**
 * Base interface for all kiln events.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the process session that produced the event */
  sessionId: string;
  /** Event type discriminator */
  type: string;
}

export type ActionName = 'build' | 'test' | 'check' | 'distribute' | 'clean' | 'diagnose';

/** Emitted when an orchestrator action starts. */
export interface ActionStarted extends BaseEvent {
  type: 'ActionStarted';
  payload: {
    action: ActionName;
    params: Record<string, unknown>;
  };
}

/** Emitted when an orchestrator action returns an outcome. */
export interface ActionFinished extends BaseEvent {
  type: 'ActionFinished';
  payload: {
    action: ActionName;
    success: boolean;
    durationMs: number;
    /** Step that failed, when the action did not succeed */
    failedStep?: string;
  };
}

/** Emitted right before an external program is spawned. */
export interface CommandStarted extends BaseEvent {
  type: 'CommandStarted';
  payload: {
    program: string;
    args: string[];
    cwd: string;
  };
}

/** Emitted when an external program exits. */
export interface CommandFinished extends BaseEvent {
  type: 'CommandFinished';
  payload: {
    program: string;
    exitCode: number;
    durationMs: number;
    errorCount: number;
    warningCount: number;
  };
}

/** Emitted when a cached prerequisite check avoided a command run. */
export interface CacheHit extends BaseEvent {
  type: 'CacheHit';
  payload: {
    key: string;
  };
}

/** Emitted when persisted state was unreadable and reset to defaults. */
export interface StateRecovered extends BaseEvent {
  type: 'StateRecovered';
  payload: {
    path: string;
    backupPath?: string;
    reason: string;
  };
}

/**
 * Union type of all kiln events.
 */
export type KilnEvent =
  | ActionStarted
  | ActionFinished
  | CommandStarted
  | CommandFinished
  | CacheHit
  | StateRecovered;

/**
 * Severity tag of a session log record.
 */
export type Severity = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'EVENT';

/**
 * Append-only, line-oriented sink for session records.
 */
export interface EventSink {
  /**
   * Append one record. The text is written verbatim after the severity tag.
   */
  write(severity: Severity, text: string): void;
  /**
   * Flush pending records and release the underlying file.
   */
  close(): Promise<void>;
}
