/**
 * ErrorType enum and classification helpers.
 */

import { describe, expect, it } from 'vitest';
import { ErrorType, isFatalErrorType, isStandardErrorType } from '../../../src/types/error-type.js';

describe('ErrorType', () => {
  it('uses snake_case string values', () => {
    expect(ErrorType.BIND_ERROR).toBe('bind_error');
    expect(ErrorType.PARSE_ERROR).toBe('parse_error');
    expect(ErrorType.HANDLER_ERROR).toBe('handler_error');
    expect(ErrorType.REQUEST_TIMEOUT).toBe('request_timeout');
    expect(ErrorType.WORKER_CRASH).toBe('worker_crash');
    expect(ErrorType.RESTART_STORM).toBe('restart_storm');
  });

  it('has exactly 9 error types', () => {
    expect(Object.values(ErrorType)).toHaveLength(9);
  });
});

describe('isStandardErrorType', () => {
  it('accepts every enum value', () => {
    for (const value of Object.values(ErrorType)) {
      expect(isStandardErrorType(value)).toBe(true);
    }
  });

  it('rejects unknown strings', () => {
    expect(isStandardErrorType('custom_error')).toBe(false);
    expect(isStandardErrorType('')).toBe(false);
    expect(isStandardErrorType('BIND_ERROR')).toBe(false);
  });
});

describe('isFatalErrorType', () => {
  it('is true for errors that end the process', () => {
    expect(isFatalErrorType('bind_error')).toBe(true);
    expect(isFatalErrorType('restart_storm')).toBe(true);
    expect(isFatalErrorType('application_load_error')).toBe(true);
    expect(isFatalErrorType('configuration_error')).toBe(true);
  });

  it('is false for request and worker scoped errors', () => {
    expect(isFatalErrorType('parse_error')).toBe(false);
    expect(isFatalErrorType('handler_error')).toBe(false);
    expect(isFatalErrorType('request_timeout')).toBe(false);
    expect(isFatalErrorType('worker_crash')).toBe(false);
    expect(isFatalErrorType('reload_error')).toBe(false);
  });

  it('is false for unknown values', () => {
    expect(isFatalErrorType('custom_error')).toBe(false);
  });
});
