/**
 * Logger Interface
 *
 * Application code depends on this interface, not on pino directly, so the
 * output flavour (pretty console, CloudWatch-friendly JSON) is chosen by the
 * factory from the environment.
 */

/**
 * Log metadata - structured data attached to log entries
 */
export type LogMetadata = Record<string, unknown>;

export interface ILogger {
  /**
   * Debug level - per-asset diagnostics, SQL timings
   */
  debug(message: string): void;
  debug(metadata: LogMetadata, message: string): void;

  /**
   * Info level - run lifecycle, summaries
   */
  info(message: string): void;
  info(metadata: LogMetadata, message: string): void;

  /**
   * Warn level - skipped assets, rejected FX rates, degraded runs
   */
  warn(message: string): void;
  warn(metadata: LogMetadata, message: string): void;

  /**
   * Error level - failed runs, database errors
   */
  error(message: string): void;
  error(metadata: LogMetadata, message: string): void;

  /**
   * Fatal level - unrecoverable startup failures
   */
  fatal(message: string): void;
  fatal(metadata: LogMetadata, message: string): void;
}

export interface ILoggerFactory {
  /**
   * @param context - Logger name (e.g., "AnalysisService", "Database")
   */
  createLogger(context?: string): ILogger;
}
