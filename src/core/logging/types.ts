export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogMeta = Record<string, unknown>;

/**
 * Structured logger used across the library
 */
export interface ResourceLogger {
  trace(msg: string, meta?: LogMeta): void;

  debug(msg: string, meta?: LogMeta): void;

  info(msg: string, meta?: LogMeta): void;

  warn(msg: string, meta?: LogMeta): void;

  error(msg: string, error?: Error, meta?: LogMeta): void;

  fatal(msg: string, error?: Error, meta?: LogMeta): void;

  /**
   * Create a child logger with additional context bindings
   */
  child(bindings: LoggerContext): ResourceLogger;
}

/**
 * Configuration options for the logger
 */
export interface LoggerConfig {
  /**
   * Log level threshold
   */
  level: LogLevel;

  /**
   * Enable pretty printing through pino-pretty (default: false)
   */
  pretty?: boolean;

  /**
   * Output file (default: stdout)
   */
  destination?: string;

  options?: {
    /**
     * Include timestamp in logs (default: true)
     */
    timestamp?: boolean;
  };
}

/**
 * Logger context for binding additional metadata
 */
export interface LoggerContext {
  component?: string;

  /**
   * Resource kind the logger reports on
   */
  kind?: string;

  apiVersion?: string;

  namespace?: string;

  [key: string]: unknown;
}
