/**
 * Error classification for the serving core.
 *
 * Every error raised by the Listener, Worker, Supervisor or configuration
 * layer carries one of these values. The value decides whether the error is
 * recovered locally (request and worker scope) or terminates the process.
 */
export enum ErrorType {
  /**
   * The listening socket could not be bound.
   * Examples: address in use, permission denied on a privileged port.
   */
  BIND_ERROR = 'bind_error',

  /**
   * The client sent bytes that are not a valid HTTP/1.1 request.
   * Answered with a 400-class status; the connection is closed.
   */
  PARSE_ERROR = 'parse_error',

  /**
   * The application handler threw or rejected.
   * Answered with 500; the worker keeps serving.
   */
  HANDLER_ERROR = 'handler_error',

  /**
   * The application handler exceeded the per-request deadline.
   */
  REQUEST_TIMEOUT = 'request_timeout',

  /**
   * A worker exited abnormally or stopped sending heartbeats.
   * Recovered by restarting the worker slot.
   */
  WORKER_CRASH = 'worker_crash',

  /**
   * Workers restarted more often than the restart-rate ceiling allows.
   */
  RESTART_STORM = 'restart_storm',

  /**
   * A rolling reload could not bring replacement workers to ready.
   */
  RELOAD_ERROR = 'reload_error',

  /**
   * The application module could not be imported or exports no handler.
   */
  APPLICATION_LOAD_ERROR = 'application_load_error',

  /**
   * Server configuration failed validation.
   */
  CONFIGURATION_ERROR = 'configuration_error',
}

const FATAL_ERROR_TYPES: readonly ErrorType[] = [
  ErrorType.BIND_ERROR,
  ErrorType.RESTART_STORM,
  ErrorType.APPLICATION_LOAD_ERROR,
  ErrorType.CONFIGURATION_ERROR,
];

/**
 * Check if an error type is one of the standard values.
 *
 * @example
 * isStandardErrorType('bind_error');   // true
 * isStandardErrorType('custom_error'); // false
 */
export function isStandardErrorType(errorType: string): errorType is ErrorType {
  return Object.values(ErrorType).some((value) => value === errorType);
}

/**
 * Check if an error type terminates the whole server.
 *
 * Request-scoped and worker-scoped errors are recovered; only these
 * propagate to a non-zero process exit.
 *
 * @example
 * isFatalErrorType('restart_storm'); // true
 * isFatalErrorType('handler_error'); // false
 */
export function isFatalErrorType(errorType: string): boolean {
  return isStandardErrorType(errorType) && FATAL_ERROR_TYPES.includes(errorType);
}
