/**
 * Error codes used throughout kiln.
 * User-correctable errors use exit code 2, interruptions 130,
 * everything else exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ExecutionError'
  | 'NonZeroExitError'
  | 'ToolUnavailableError'
  | 'CorruptStateError'
  | 'StateAccessError'
  | 'FilesystemError'
  // Cancellation (exit code 130)
  | 'InterruptedError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all kiln errors.
 *
 * @example
 * ```typescript
 * throw new AppError('FilesystemError', 'Could not stage artifact', {
 *   cause: originalError,
 *   details: { path: 'dist/EFI/BOOT/BOOTX64.EFI' },
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when the configuration file is invalid.
 * User-correctable - suggests fixing kiln.yaml.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when an action is invoked with invalid arguments.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when an external program could not be spawned
 * (missing executable, permission denied). Never retried.
 */
export class ExecutionError extends AppError {
  /** Time elapsed until the failure was detected */
  public readonly durationMs: number;
  /** OS error code reported by the spawn attempt, e.g. ENOENT */
  public readonly osCode?: string;

  constructor(
    message: string,
    options: AppErrorOptions & { durationMs?: number; osCode?: string } = {},
  ) {
    super('ExecutionError', message, options);
    this.durationMs = options.durationMs ?? 0;
    this.osCode = options.osCode;
  }
}

/**
 * Error describing a process that ran and exited with a non-zero status.
 */
export class NonZeroExitError extends AppError {
  public readonly exitCode: number;

  constructor(message: string, options: AppErrorOptions & { exitCode: number }) {
    super('NonZeroExitError', message, options);
    this.exitCode = options.exitCode;
  }
}

/**
 * Error thrown when an optional verification tool is not installed.
 * Callers downgrade it to "not applicable".
 */
export class ToolUnavailableError extends AppError {
  public readonly tool: string;

  constructor(tool: string, options: AppErrorOptions = {}) {
    super('ToolUnavailableError', `Tool "${tool}" is not available on PATH`, options);
    this.tool = tool;
  }
}

/**
 * Error describing persisted state (metrics, cache) that could not be parsed.
 * Recovered by resetting to defaults, but always reported.
 */
export class CorruptStateError extends AppError {
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('CorruptStateError', message, options);
    this.path = path;
  }
}

/**
 * Error thrown when persisted state cannot be accessed (permission denied).
 * Never recovered silently.
 */
export class StateAccessError extends AppError {
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('StateAccessError', message, options);
    this.path = path;
  }
}

/**
 * Error thrown when staging or copying files fails.
 */
export class FilesystemError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('FilesystemError', message, options);
  }
}

/**
 * Error thrown when the user cancels a running action.
 */
export class InterruptedError extends AppError {
  constructor(message = 'Interrupted by user', options: AppErrorOptions = {}) {
    super('InterruptedError', message, options);
  }
}

/**
 * Maps an error to the CLI exit code.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof InterruptedError) return 130;
  if (error instanceof ConfigError || error instanceof UsageError) return 2;
  return 1;
}

/**
 * Reads the `code` property of a Node.js system error, if present.
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
