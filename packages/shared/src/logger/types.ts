import type { KilnEvent } from '../types/events';

/**
 * Interface for logging throughout kiln.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * logger.log({ type: 'ActionStarted', ... });
 * logger.trace(event, 'Build finished in 4.2s');
 * logger.warn('metrics.json was unreadable, starting from defaults');
 *
 * const buildLogger = logger.child({ action: 'build' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured event.
   */
  log(event: KilnEvent): void;

  /**
   * High-signal event with a human-readable summary.
   */
  trace(event: KilnEvent, message: string): void;

  /** Log a debug message (lowest priority, hidden unless verbose) */
  debug(message: string): void;
  /** Log an informational message */
  info(message: string): void;
  /** Log a warning message */
  warn(message: string): void;
  /**
   * Log an error with optional message.
   */
  error(error: Error, message?: string): void;

  /**
   * Create a child logger whose messages are prefixed with the bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}

export function formatBindings(bindings: Record<string, unknown>, message: string): string {
  const prefix = Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return prefix ? `[${prefix}] ${message}` : message;
}
