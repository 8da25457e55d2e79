/**
 * Interface for logging throughout plugver.
 *
 * @example
 * ```typescript
 * logger.info('Loaded 3 manifests');
 * logger.error(new Error('Failed'), 'Verification failed');
 *
 * // Create a child logger with additional context
 * const fileLogger = logger.child({ file: 'plugins.yaml' });
 * ```
 */
export interface Logger {
  /** Log a debug message (lowest priority, only shown with --verbose) */
  debug(message: string): void;
  /** Log an informational message */
  info(message: string): void;
  /** Log a warning message */
  warn(message: string): void;
  /**
   * Log an error with optional message.
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): void;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
