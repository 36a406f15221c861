/**
 * Structured logging API for the serving core.
 *
 * Every component logs through a shared pino root logger. Messages carry
 * structured fields (component, operation, worker_id, ...) so supervisor and
 * worker output can be correlated across processes.
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

/**
 * Structured logging fields.
 *
 * All fields are optional. Common fields include:
 * - component: Component/subsystem identifier (e.g., "supervisor", "worker")
 * - operation: Operation being performed (e.g., "reload")
 * - worker_id: Worker identifier
 * - slot: Supervisor slot number
 * - error_message: Error message for error logs
 * - duration_ms: Duration for timed operations
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined;
}

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/**
 * Options for building the root logger.
 */
export interface RootLoggerOptions {
  /** Minimum level to emit (default: PREFORK_LOG_LEVEL or "info") */
  level?: LogLevel;

  /** Logger name (default: "prefork") */
  name?: string;

  /** Pretty-print through pino-pretty (default: outside production and tests) */
  pretty?: boolean;
}

const isProduction = (): boolean =>
  process.env.PREFORK_ENV === 'production' || process.env.NODE_ENV === 'production';

const isTest = (): boolean => process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

/**
 * Build a pino logger with the serving core's defaults.
 *
 * A destination stream disables the pretty transport, since pino cannot
 * combine the two.
 */
export function createRootLogger(
  options: RootLoggerOptions = {},
  destination?: DestinationStream
): Logger {
  const loggerOptions: LoggerOptions = {
    name: options.name ?? 'prefork',
    level: options.level ?? process.env.PREFORK_LOG_LEVEL ?? 'info',
    base: { pid: process.pid },
  };

  if (destination) {
    return pino(loggerOptions, destination);
  }

  // Add pino-pretty transport in non-production environments
  const pretty = options.pretty ?? (!isProduction() && !isTest());
  if (pretty) {
    loggerOptions.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return pino(loggerOptions);
}

let rootLogger: Logger | null = null;

/**
 * Get the shared root logger, creating it on first use.
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createRootLogger();
  }
  return rootLogger;
}

/**
 * Replace the shared root logger (CLI level overrides, tests).
 */
export function setRootLogger(logger: Logger): void {
  rootLogger = logger;
}

/**
 * Change the level of the shared root logger.
 */
export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
}

/**
 * Drop undefined values so pino does not serialize empty keys.
 */
function compactFields(fields?: LogFields): Record<string, string | number | boolean | null> {
  const result: Record<string, string | number | boolean | null> = {};
  if (!fields) {
    return result;
  }
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Log an ERROR level message with structured fields.
 *
 * Use this for failures that lose work: a crashed worker, a failed request.
 *
 * @example
 * logError('Worker crashed', {
 *   component: 'supervisor',
 *   worker_id: 'worker-3',
 *   error_message: 'exit code 1',
 * });
 */
export function logError(message: string, fields?: LogFields): void {
  getRootLogger().error(compactFields(fields), message);
}

/**
 * Log a WARN level message with structured fields.
 *
 * Use this for degraded operation: a timed out request, a killed worker.
 */
export function logWarn(message: string, fields?: LogFields): void {
  getRootLogger().warn(compactFields(fields), message);
}

/**
 * Log an INFO level message with structured fields.
 *
 * Use this for lifecycle events and state transitions.
 */
export function logInfo(message: string, fields?: LogFields): void {
  getRootLogger().info(compactFields(fields), message);
}

/**
 * Log a DEBUG level message with structured fields.
 */
export function logDebug(message: string, fields?: LogFields): void {
  getRootLogger().debug(compactFields(fields), message);
}

/**
 * Log a TRACE level message with structured fields.
 *
 * Per-connection and per-request detail; disabled outside debugging.
 */
export function logTrace(message: string, fields?: LogFields): void {
  getRootLogger().trace(compactFields(fields), message);
}

/**
 * Log a FATAL level message with structured fields.
 */
export function logFatal(message: string, fields?: LogFields): void {
  getRootLogger().fatal(compactFields(fields), message);
}

/**
 * Component logger returned by createLogger().
 */
export interface ComponentLogger {
  fatal(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  trace(message: string, fields?: LogFields): void;
}

/**
 * Create a logger with preset fields.
 *
 * Useful for creating component-specific loggers that automatically
 * include common fields in every log message.
 *
 * @example
 * const logger = createLogger({ component: 'worker', worker_id: 'worker-1' });
 * logger.info('Accepted connection', { remote_address: '10.0.0.4' });
 * // Logs: { component: 'worker', worker_id: 'worker-1', remote_address: '10.0.0.4' }
 */
export function createLogger(defaultFields: LogFields): ComponentLogger {
  const mergeFields = (fields?: LogFields): LogFields => ({
    ...defaultFields,
    ...fields,
  });

  return {
    fatal: (message, fields) => logFatal(message, mergeFields(fields)),
    error: (message, fields) => logError(message, mergeFields(fields)),
    warn: (message, fields) => logWarn(message, mergeFields(fields)),
    info: (message, fields) => logInfo(message, mergeFields(fields)),
    debug: (message, fields) => logDebug(message, mergeFields(fields)),
    trace: (message, fields) => logTrace(message, mergeFields(fields)),
  };
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
