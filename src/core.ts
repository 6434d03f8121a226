/**
 * Core - Consolidated exports
 *
 * Single entry point for descriptors, request synthesis, transport and the
 * ambient error and logging types.
 */

// =============================================================================
// Errors
// =============================================================================
export {
  formatArktypeError,
  RequestSpecError,
  ResourceApiError,
  ResourceDefinitionError,
} from './core/errors.js';

// =============================================================================
// Logging
// =============================================================================
export {
  createLogger,
  getComponentLogger,
  getLoggerConfigFromEnv,
  getResourceLogger,
  logger,
  validateLoggerConfig,
} from './core/logging/index.js';
export type { LoggerConfig, LoggerContext, LogLevel, ResourceLogger } from './core/logging/index.js';

// =============================================================================
// Resource descriptors
// =============================================================================
export * from './core/resource/index.js';

// =============================================================================
// Request synthesis
// =============================================================================
export * from './core/request/index.js';

// =============================================================================
// Transport and typed access
// =============================================================================
export * from './core/kubernetes/index.js';
