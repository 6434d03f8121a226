import { describe, expect, it } from 'vitest';
import {
  createLogger,
  DEFAULT_LOGGER_CONFIG,
  getComponentLogger,
  getLoggerConfigFromEnv,
  getResourceLogger,
  validateLoggerConfig,
} from '../../src/core/logging/index.js';

describe('Logging', () => {
  describe('Logger Creation', () => {
    it('should create a logger with every level method', () => {
      const logger = createLogger({ level: 'fatal' });
      for (const method of ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'child'] as const) {
        expect(typeof logger[method]).toBe('function');
      }
    });

    it('should create child, component and resource loggers', () => {
      const child = createLogger({ level: 'fatal' }).child({ component: 'test' });
      expect(typeof child.info).toBe('function');
      expect(typeof getComponentLogger('request-spec').debug).toBe('function');
      expect(typeof getResourceLogger('Foo', 'clux.dev/v1', 'myns').debug).toBe('function');
    });
  });

  describe('Environment Configuration', () => {
    it('should default to info without pretty printing', () => {
      expect(getLoggerConfigFromEnv({})).toEqual(DEFAULT_LOGGER_CONFIG);
    });

    it('should read the log level case-insensitively', () => {
      expect(getLoggerConfigFromEnv({ KUBE_RESOURCE_LOG_LEVEL: 'DEBUG' }).level).toBe('debug');
    });

    it('should ignore unknown log levels', () => {
      expect(getLoggerConfigFromEnv({ KUBE_RESOURCE_LOG_LEVEL: 'verbose' }).level).toBe('info');
    });

    it('should enable pretty printing in development or on request', () => {
      expect(getLoggerConfigFromEnv({ NODE_ENV: 'development' }).pretty).toBe(true);
      expect(getLoggerConfigFromEnv({ KUBE_RESOURCE_LOG_PRETTY: 'true' }).pretty).toBe(true);
    });

    it('should read destination and timestamp settings', () => {
      const config = getLoggerConfigFromEnv({
        KUBE_RESOURCE_LOG_DESTINATION: '/tmp/resource.log',
        KUBE_RESOURCE_LOG_TIMESTAMP: 'false',
      });
      expect(config.destination).toBe('/tmp/resource.log');
      expect(config.options).toEqual({ timestamp: false });
    });
  });

  describe('Logger Methods', () => {
    it('should accept errors and metadata', () => {
      const logger = createLogger({ level: 'fatal' });
      const error = new Error('Test error');

      expect(() => logger.info('Request synthesized', { verb: 'get' })).not.toThrow();
      expect(() => logger.error('Request failed', error, { statusCode: 404 })).not.toThrow();
      expect(() => logger.error('Request failed', undefined, { statusCode: 404 })).not.toThrow();
    });
  });

  describe('Validation', () => {
    it('should reject invalid log levels', () => {
      expect(() => validateLoggerConfig({ level: 'verbose' })).toThrow(
        'Invalid log level: verbose. Must be one of: trace, debug, info, warn, error, fatal'
      );
    });

    it('should reject an empty destination', () => {
      expect(() => validateLoggerConfig({ level: 'info', destination: ' ' })).toThrow(
        'Log destination must be a non-empty path'
      );
    });
  });
});
