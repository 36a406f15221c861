/**
 * Error taxonomy for the serving core.
 *
 * @module types
 */

export { ErrorType, isFatalErrorType, isStandardErrorType } from './error-type.js';
export {
  ApplicationLoadError,
  BindError,
  ConfigurationError,
  HandlerError,
  ParseError,
  PreforkError,
  ReloadError,
  RequestTimeoutError,
  RestartStormError,
  WorkerCrashError,
} from './errors.js';
