/**
 * prefork-http
 *
 * Pre-fork HTTP/1.1 serving core: one shared listener, a supervised pool of
 * workers, rolling reload and graceful shutdown.
 *
 * @packageDocumentation
 */

// =============================================================================
// CLI module
// =============================================================================
export * from './cli/index.js';

// =============================================================================
// Config module
// =============================================================================
export * from './config/index.js';

// =============================================================================
// Events module
// =============================================================================
export * from './events/index.js';

// =============================================================================
// HTTP module - Request/Response exchanged with the application
// =============================================================================
export * from './http/index.js';

// =============================================================================
// Listener module
// =============================================================================
export * from './listener/index.js';

// =============================================================================
// Logging module
// =============================================================================
export {
  type ComponentLogger,
  createLogger,
  createRootLogger,
  errorMessage,
  getRootLogger,
  type LogFields,
  type LogLevel,
  logDebug,
  logError,
  logFatal,
  logInfo,
  logTrace,
  logWarn,
  type RootLoggerOptions,
  setLogLevel,
  setRootLogger,
} from './logging/index.js';

// =============================================================================
// Process module - worker execution models
// =============================================================================
export * from './process/index.js';

// =============================================================================
// Server module - PreforkServer facade and control plane
// =============================================================================
export * from './server/index.js';

// =============================================================================
// Supervisor module
// =============================================================================
export * from './supervisor/index.js';

// =============================================================================
// Types module - error taxonomy
// =============================================================================
export * from './types/index.js';

// =============================================================================
// Worker module
// =============================================================================
export * from './worker/index.js';
