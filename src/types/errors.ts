/**
 * Error classes for the serving core.
 */

import { ErrorType, isFatalErrorType } from './error-type.js';

/**
 * Base class for every error raised by the serving core.
 */
export class PreforkError extends Error {
  readonly errorType: ErrorType;

  constructor(message: string, errorType: ErrorType, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PreforkError';
    this.errorType = errorType;
  }

  /**
   * Whether this error must terminate the process.
   */
  get fatal(): boolean {
    return isFatalErrorType(this.errorType);
  }
}

/**
 * Error thrown when the listening socket cannot be bound.
 */
export class BindError extends PreforkError {
  readonly host: string;
  readonly port: number;
  readonly code: string;

  constructor(host: string, port: number, code: string, options?: { cause?: unknown }) {
    super(`Cannot bind ${host}:${port}: ${describeBindCode(code)}`, ErrorType.BIND_ERROR, options);
    this.name = 'BindError';
    this.host = host;
    this.port = port;
    this.code = code;
  }

  static fromSystemError(error: NodeJS.ErrnoException, host: string, port: number): BindError {
    return new BindError(host, port, error.code ?? 'UNKNOWN', { cause: error });
  }
}

function describeBindCode(code: string): string {
  switch (code) {
    case 'EADDRINUSE':
      return 'address already in use';
    case 'EACCES':
      return 'permission denied';
    case 'EADDRNOTAVAIL':
      return 'address not available';
    default:
      return code;
  }
}

/**
 * Error raised when a client sends a malformed request.
 */
export class ParseError extends PreforkError {
  /** Status code sent to the client (400 or 431) */
  readonly statusCode: number;
  /** Parser error code, when the HTTP parser reported one */
  readonly code: string | undefined;

  constructor(message: string, statusCode = 400, code?: string, options?: { cause?: unknown }) {
    super(message, ErrorType.PARSE_ERROR, options);
    this.name = 'ParseError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

/**
 * Error wrapping a failure thrown by the application handler.
 */
export class HandlerError extends PreforkError {
  readonly method: string;
  readonly path: string;

  constructor(method: string, path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Handler failed for ${method} ${path}: ${detail}`, ErrorType.HANDLER_ERROR, { cause });
    this.name = 'HandlerError';
    this.method = method;
    this.path = path;
  }
}

/**
 * Error used to abort a request that exceeded its deadline.
 */
export class RequestTimeoutError extends PreforkError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request exceeded deadline of ${timeoutMs}ms`, ErrorType.REQUEST_TIMEOUT);
    this.name = 'RequestTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Error describing a worker that exited abnormally or hung.
 */
export class WorkerCrashError extends PreforkError {
  readonly workerId: string;
  readonly exitCode: number | null;
  readonly signal: string | null;

  constructor(workerId: string, exitCode: number | null, signal: string | null, detail?: string) {
    const how = signal ? `signal ${signal}` : `exit code ${exitCode ?? 'unknown'}`;
    super(
      `Worker ${workerId} stopped unexpectedly (${detail ?? how})`,
      ErrorType.WORKER_CRASH
    );
    this.name = 'WorkerCrashError';
    this.workerId = workerId;
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

/**
 * Error raised when restarts exceed the restart-rate ceiling.
 */
export class RestartStormError extends PreforkError {
  readonly restarts: number;
  readonly windowMs: number;

  constructor(restarts: number, windowMs: number) {
    super(
      `Workers restarted ${restarts} times within ${windowMs}ms; giving up`,
      ErrorType.RESTART_STORM
    );
    this.name = 'RestartStormError';
    this.restarts = restarts;
    this.windowMs = windowMs;
  }
}

/**
 * Error raised when a rolling reload cannot complete.
 */
export class ReloadError extends PreforkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorType.RELOAD_ERROR, options);
    this.name = 'ReloadError';
  }
}

/**
 * Error raised when the application module cannot provide a handler.
 */
export class ApplicationLoadError extends PreforkError {
  readonly app: string;

  constructor(app: string, message: string, options?: { cause?: unknown }) {
    super(`Cannot load application '${app}': ${message}`, ErrorType.APPLICATION_LOAD_ERROR, options);
    this.name = 'ApplicationLoadError';
    this.app = app;
  }
}

/**
 * Error raised when configuration fails validation.
 */
export class ConfigurationError extends PreforkError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid server configuration: ${issues.join('; ')}`, ErrorType.CONFIGURATION_ERROR);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
