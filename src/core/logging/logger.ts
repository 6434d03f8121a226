import pino from 'pino';
import { getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';
import type { LogMeta, LoggerConfig, LoggerContext, ResourceLogger } from './types.js';

function withError(meta: LogMeta | undefined, error: Error | undefined): LogMeta {
  const logData: LogMeta = { ...meta };
  if (error) {
    logData.error = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return logData;
}

/**
 * Pino-based implementation of ResourceLogger
 */
class PinoLogger implements ResourceLogger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  trace(msg: string, meta?: LogMeta): void {
    this.pinoLogger.trace(meta, msg);
  }

  debug(msg: string, meta?: LogMeta): void {
    this.pinoLogger.debug(meta, msg);
  }

  info(msg: string, meta?: LogMeta): void {
    this.pinoLogger.info(meta, msg);
  }

  warn(msg: string, meta?: LogMeta): void {
    this.pinoLogger.warn(meta, msg);
  }

  error(msg: string, error?: Error, meta?: LogMeta): void {
    this.pinoLogger.error(withError(meta, error), msg);
  }

  fatal(msg: string, error?: Error, meta?: LogMeta): void {
    this.pinoLogger.fatal(withError(meta, error), msg);
  }

  child(bindings: LoggerContext): ResourceLogger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

/**
 * Create a logger with the specified configuration, layered over the
 * environment configuration
 */
export function createLogger(config?: Partial<LoggerConfig>): ResourceLogger {
  const finalConfig: LoggerConfig = { ...getLoggerConfigFromEnv(), ...config };
  validateLoggerConfig(finalConfig);

  const pinoOptions: pino.LoggerOptions = {
    level: finalConfig.level,
    timestamp: finalConfig.options?.timestamp !== false,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  let transport: pino.TransportSingleOptions | undefined;

  if (finalConfig.pretty) {
    transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  } else if (finalConfig.destination && finalConfig.destination !== 'stdout') {
    transport = {
      target: 'pino/file',
      options: {
        destination: finalConfig.destination,
      },
    };
  }

  const pinoLogger = transport ? pino(pinoOptions, pino.transport(transport)) : pino(pinoOptions);

  return new PinoLogger(pinoLogger);
}

/**
 * Default logger instance using environment configuration
 */
export const logger: ResourceLogger = createLogger();

export function getComponentLogger(component: string, additionalContext?: LogMeta): ResourceLogger {
  return logger.child({ component, ...additionalContext });
}

/**
 * Logger bound to one resource type
 */
export function getResourceLogger(
  kind: string,
  apiVersion: string,
  namespace?: string,
  additionalContext?: LogMeta
): ResourceLogger {
  return logger.child({ kind, apiVersion, namespace, ...additionalContext });
}
