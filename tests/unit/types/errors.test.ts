/**
 * Error class tests.
 */

import { describe, expect, it } from 'vitest';
import { ErrorType } from '../../../src/types/error-type.js';
import {
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
} from '../../../src/types/errors.js';

describe('BindError', () => {
  it('describes address in use', () => {
    const error = new BindError('127.0.0.1', 8080, 'EADDRINUSE');
    expect(error.message).toBe('Cannot bind 127.0.0.1:8080: address already in use');
    expect(error.errorType).toBe(ErrorType.BIND_ERROR);
    expect(error.fatal).toBe(true);
    expect(error).toBeInstanceOf(PreforkError);
    expect(error.name).toBe('BindError');
  });

  it('falls back to the raw code', () => {
    expect(new BindError('::', 80, 'EWEIRD').message).toBe('Cannot bind :::80: EWEIRD');
  });

  it('builds from a system error and keeps it as cause', () => {
    const cause: NodeJS.ErrnoException = Object.assign(new Error('listen EACCES'), { code: 'EACCES' });
    const error = BindError.fromSystemError(cause, '0.0.0.0', 80);
    expect(error.code).toBe('EACCES');
    expect(error.message).toBe('Cannot bind 0.0.0.0:80: permission denied');
    expect(error.cause).toBe(cause);
  });

  it('uses UNKNOWN when the system error has no code', () => {
    expect(BindError.fromSystemError(new Error('odd'), 'localhost', 1).code).toBe('UNKNOWN');
  });
});

describe('ParseError', () => {
  it('defaults to status 400', () => {
    const error = new ParseError('bad request line');
    expect(error.statusCode).toBe(400);
    expect(error.code).toBeUndefined();
    expect(error.fatal).toBe(false);
  });

  it('keeps the parser code and status', () => {
    const error = new ParseError('headers too large', 431, 'HPE_HEADER_OVERFLOW');
    expect(error.statusCode).toBe(431);
    expect(error.code).toBe('HPE_HEADER_OVERFLOW');
  });
});

describe('HandlerError', () => {
  it('includes method, path and cause message', () => {
    const cause = new Error('db down');
    const error = new HandlerError('POST', '/orders', cause);
    expect(error.message).toBe('Handler failed for POST /orders: db down');
    expect(error.cause).toBe(cause);
    expect(error.errorType).toBe(ErrorType.HANDLER_ERROR);
  });

  it('stringifies non-Error causes', () => {
    expect(new HandlerError('GET', '/', 'nope').message).toBe('Handler failed for GET /: nope');
  });
});

describe('RequestTimeoutError', () => {
  it('reports the deadline', () => {
    const error = new RequestTimeoutError(250);
    expect(error.timeoutMs).toBe(250);
    expect(error.message).toBe('Request exceeded deadline of 250ms');
  });
});

describe('WorkerCrashError', () => {
  it('describes a signal', () => {
    expect(new WorkerCrashError('worker-2', null, 'SIGKILL').message).toBe(
      'Worker worker-2 stopped unexpectedly (signal SIGKILL)'
    );
  });

  it('describes an exit code', () => {
    const error = new WorkerCrashError('worker-1', 3, null);
    expect(error.message).toBe('Worker worker-1 stopped unexpectedly (exit code 3)');
    expect(error.exitCode).toBe(3);
    expect(error.fatal).toBe(false);
  });

  it('prefers the detail when given', () => {
    expect(new WorkerCrashError('worker-1', 1, null, 'app failed').message).toBe(
      'Worker worker-1 stopped unexpectedly (app failed)'
    );
  });
});

describe('fatal errors', () => {
  it('RestartStormError is fatal', () => {
    const error = new RestartStormError(11, 60_000);
    expect(error.message).toBe('Workers restarted 11 times within 60000ms; giving up');
    expect(error.fatal).toBe(true);
  });

  it('ApplicationLoadError names the reference', () => {
    const error = new ApplicationLoadError('./app.js:main', 'module has no export');
    expect(error.message).toBe("Cannot load application './app.js:main': module has no export");
    expect(error.app).toBe('./app.js:main');
    expect(error.fatal).toBe(true);
  });

  it('ConfigurationError joins every issue', () => {
    const error = new ConfigurationError(['workers: too small', 'port: too big']);
    expect(error.message).toBe('Invalid server configuration: workers: too small; port: too big');
    expect(error.issues).toEqual(['workers: too small', 'port: too big']);
  });

  it('ReloadError is not fatal', () => {
    expect(new ReloadError('replacement failed').fatal).toBe(false);
  });
});
