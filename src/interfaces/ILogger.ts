/**
 * Logger Interface
 *
 * Abstraction for logging across environments.
 * Application code depends on this interface, the factory picks the adapter.
 */

/**
 * Log metadata - structured data attached to log entries
 */
export type LogMetadata = Record<string, unknown>;

/**
 * Logger interface following common logging patterns (pino, winston, etc.)
 */
export interface ILogger {
  /**
   * Detailed diagnostic information
   * Example: "Directory lookup started", "Executed SQL query"
   */
  debug(message: string): void;
  debug(metadata: LogMetadata, message: string): void;

  /**
   * Normal operations and business events
   * Example: "Equity added to portfolio", "Draft committed"
   */
  info(message: string): void;
  info(metadata: LogMetadata, message: string): void;

  /**
   * Recoverable problems and rejected input
   * Example: "Ticker not found", "Quote missing for held ticker"
   */
  warn(message: string): void;
  warn(metadata: LogMetadata, message: string): void;

  error(message: string): void;
  error(metadata: LogMetadata, message: string): void;

  fatal(message: string): void;
  fatal(metadata: LogMetadata, message: string): void;
}

export interface ILoggerFactory {
  /**
   * @param context - Optional context name (e.g., "PortfolioService", "Database")
   */
  createLogger(context?: string): ILogger;
}
