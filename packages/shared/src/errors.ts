/**
 * Error codes used throughout plugver.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  | 'FormatError'
  // Runtime errors (exit code 1)
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
 * Base error class for all plugver errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ConfigError', 'Manifest not found', {
 *   details: { path: 'plugins.yaml' }
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
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing the manifest file.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Invalid plugin name, version, download URL or `name:version` string.
 * The message embeds the offending value and the pattern it violated.
 */
export class FormatError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('FormatError', message, options);
  }
}

/**
 * Whether an error should be reported with the user-correctable exit code.
 */
export function isUserError(error: unknown): error is AppError {
  return (
    error instanceof AppError &&
    (error.code === 'ConfigError' || error.code === 'UsageError' || error.code === 'FormatError')
  );
}

export function exitCodeFor(error: unknown): number {
  return isUserError(error) ? 2 : 1;
}
