/**
 * Abstract logger interface for dependency injection.
 *
 * This abstraction allows us to:
 * - Write to the console in production (ConsoleLogger)
 * - Capture log lines in tests (RecordingLogger)
 * - Route messages into a host application's own logging
 *
 * @example
 * ```ts
 * const logger = new ConsoleLogger({ debug: true });
 * logger.warn('falling back to default compressor options');
 * ```
 */
export interface Logger {
  /** Diagnostic detail, normally hidden. */
  debug(message: string): void;

  /** Routine progress. */
  info(message: string): void;

  /** Something was wrong but work continued. */
  warn(message: string): void;

  /** Something failed. */
  error(message: string): void;
}

/** Severity of a log line. */
export type LogLevel = keyof Logger;
