/**
 * Server configuration loading tests.
 */

import { describe, expect, it } from 'vitest';
import {
  DEFAULT_SERVER_CONFIG,
  loadServerConfig,
  parseBind,
  readEnvOverrides,
} from '../../../src/config/server-config.js';
import { ConfigurationError } from '../../../src/types/errors.js';

function configurationIssues(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('parseBind', () => {
  it('parses host:port', () => {
    expect(parseBind('127.0.0.1:9000')).toEqual({ host: '127.0.0.1', port: 9000 });
  });

  it('parses bracketed IPv6', () => {
    expect(parseBind('[::1]:9000')).toEqual({ host: '::1', port: 9000 });
    expect(parseBind('[::1]')).toEqual({ host: '::1', port: 8080 });
  });

  it('treats ":port" as all interfaces', () => {
    expect(parseBind(':3000')).toEqual({ host: '0.0.0.0', port: 3000 });
  });

  it('uses the default port for a bare host', () => {
    expect(parseBind('localhost')).toEqual({ host: 'localhost', port: 8080 });
  });

  it('keeps an unbracketed IPv6 address as host', () => {
    expect(parseBind('::1')).toEqual({ host: '::1', port: 8080 });
  });

  it('accepts port 0', () => {
    expect(parseBind('127.0.0.1:0')).toEqual({ host: '127.0.0.1', port: 0 });
  });

  it('rejects invalid ports', () => {
    expect(configurationIssues(() => parseBind('host:http'))).toEqual(["bind: invalid port 'http'"]);
    expect(configurationIssues(() => parseBind('host:70000'))).toEqual(["bind: invalid port '70000'"]);
  });

  it('rejects empty and malformed values', () => {
    expect(configurationIssues(() => parseBind('  '))).toEqual(['bind: must not be empty']);
    expect(configurationIssues(() => parseBind('[::1'))).toEqual([
      "bind: unterminated IPv6 address in '[::1'",
    ]);
    expect(configurationIssues(() => parseBind('[::1]x'))).toEqual([
      "bind: unexpected 'x' after IPv6 address",
    ]);
  });
});

describe('readEnvOverrides', () => {
  it('returns nothing for an empty environment', () => {
    expect(readEnvOverrides({})).toEqual({});
  });

  it('converts seconds to milliseconds', () => {
    expect(
      readEnvOverrides({
        PREFORK_TIMEOUT: '10',
        PREFORK_REQUEST_TIMEOUT: '1.5',
        PREFORK_GRACEFUL_TIMEOUT: '0',
        PREFORK_KEEP_ALIVE: '5',
      })
    ).toEqual({
      timeoutMs: 10_000,
      requestTimeoutMs: 1_500,
      gracefulTimeoutMs: 0,
      keepAliveTimeoutMs: 5_000,
    });
  });

  it('prefers PREFORK_BIND over PORT', () => {
    expect(readEnvOverrides({ PREFORK_BIND: '127.0.0.1:81', PORT: '82' })).toEqual({
      bind: '127.0.0.1:81',
    });
    expect(readEnvOverrides({ PORT: '82' })).toEqual({ port: 82 });
  });

  it('reads workers and worker model', () => {
    expect(readEnvOverrides({ WEB_CONCURRENCY: '4', PREFORK_WORKER_MODEL: 'inline' })).toEqual({
      workers: 4,
      workerModel: 'inline',
    });
  });

  it('ignores blank values', () => {
    expect(readEnvOverrides({ WEB_CONCURRENCY: '  ' })).toEqual({});
  });

  it('rejects fractional counts but accepts fractional seconds', () => {
    expect(
      configurationIssues(() =>
        readEnvOverrides({ WEB_CONCURRENCY: '2.5', PREFORK_MAX_REQUESTS: '1e3', PORT: '80.9' })
      )
    ).toEqual([
      "PORT: must be a non-negative integer, got '80.9'",
      "WEB_CONCURRENCY: must be a non-negative integer, got '2.5'",
      "PREFORK_MAX_REQUESTS: must be a non-negative integer, got '1e3'",
    ]);
    expect(readEnvOverrides({ PREFORK_KEEP_ALIVE: '0.25' })).toEqual({ keepAliveTimeoutMs: 250 });
  });

  it('rejects negative seconds', () => {
    expect(configurationIssues(() => readEnvOverrides({ PREFORK_TIMEOUT: '-1' }))).toEqual([
      "PREFORK_TIMEOUT: must be a non-negative number of seconds, got '-1'",
    ]);
  });

  it('collects every invalid variable', () => {
    expect(
      configurationIssues(() =>
        readEnvOverrides({ WEB_CONCURRENCY: 'many', PREFORK_WORKER_MODEL: 'thread' })
      )
    ).toEqual([
      "WEB_CONCURRENCY: must be a non-negative integer, got 'many'",
      "PREFORK_WORKER_MODEL: must be 'process' or 'inline', got 'thread'",
    ]);
  });
});

describe('loadServerConfig', () => {
  it('returns the defaults for no input', () => {
    expect(loadServerConfig({}, {})).toEqual(DEFAULT_SERVER_CONFIG);
  });

  it('returns a frozen object', () => {
    const config = loadServerConfig({}, {});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.restartLimit)).toBe(true);
  });

  it('lets overrides win over the environment', () => {
    const config = loadServerConfig({ workers: 2 }, { WEB_CONCURRENCY: '8', PORT: '9090' });
    expect(config.workers).toBe(2);
    expect(config.port).toBe(9090);
  });

  it('applies bind before explicit host and port', () => {
    const config = loadServerConfig({ bind: '10.0.0.1:81', port: 82 }, {});
    expect(config.host).toBe('10.0.0.1');
    expect(config.port).toBe(82);
  });

  it('merges partial restart limits', () => {
    const config = loadServerConfig({ restartLimit: { maxRestarts: 3 } }, {});
    expect(config.restartLimit).toEqual({ maxRestarts: 3, windowMs: 60_000 });
  });

  it('rejects zero workers', () => {
    const issues = configurationIssues(() => loadServerConfig({ workers: 0 }, {}));
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^workers: /);
  });

  it('requires timeout to exceed the heartbeat interval', () => {
    const issues = configurationIssues(() =>
      loadServerConfig({ timeoutMs: 500, heartbeatIntervalMs: 1_000 }, {})
    );
    expect(issues).toEqual(['timeoutMs: must be greater than heartbeatIntervalMs']);
  });

  it('reports invalid environment values', () => {
    const issues = configurationIssues(() => loadServerConfig({}, { WEB_CONCURRENCY: '0' }));
    expect(issues[0]).toMatch(/^workers: /);
  });
});
