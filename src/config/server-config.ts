/**
 * Server configuration loading.
 *
 * Precedence, lowest first: built-in defaults, environment variables,
 * explicit overrides (CLI flags or code). The merged result is validated
 * and frozen.
 */

import { z } from 'zod';
import { ConfigurationError } from '../types/errors.js';
import type { ServerConfig, ServerConfigOverrides } from './types.js';

export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_PORT = 8080;

/**
 * Built-in defaults.
 */
export const DEFAULT_SERVER_CONFIG: ServerConfig = Object.freeze({
  host: DEFAULT_HOST,
  port: DEFAULT_PORT,
  workers: 1,
  workerModel: 'process',
  requestTimeoutMs: 30_000,
  gracefulTimeoutMs: 30_000,
  timeoutMs: 30_000,
  heartbeatIntervalMs: 1_000,
  monitorIntervalMs: 1_000,
  bootTimeoutMs: 30_000,
  keepAliveTimeoutMs: 2_000,
  maxRequestsPerConnection: 100,
  workerConnections: 1_000,
  maxRequests: 0,
  maxRequestsJitter: 0,
  maxHeaderSize: 16_384,
  backlog: 2_048,
  restartLimit: Object.freeze({ maxRestarts: 10, windowMs: 60_000 }),
});

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const serverConfigSchema = z
  .object({
    host: z.string().trim().min(1, 'must not be empty'),
    port: z.number().int().min(0).max(65_535),
    workers: positiveInt,
    workerModel: z.enum(['process', 'inline']),
    requestTimeoutMs: positiveInt,
    gracefulTimeoutMs: nonNegativeInt,
    timeoutMs: positiveInt,
    heartbeatIntervalMs: positiveInt,
    monitorIntervalMs: positiveInt,
    bootTimeoutMs: positiveInt,
    keepAliveTimeoutMs: nonNegativeInt,
    maxRequestsPerConnection: nonNegativeInt,
    workerConnections: positiveInt,
    maxRequests: nonNegativeInt,
    maxRequestsJitter: nonNegativeInt,
    maxHeaderSize: positiveInt,
    backlog: positiveInt,
    restartLimit: z.object({
      maxRestarts: nonNegativeInt,
      windowMs: positiveInt,
    }),
  })
  .refine((config) => config.timeoutMs > config.heartbeatIntervalMs, {
    message: 'must be greater than heartbeatIntervalMs',
    path: ['timeoutMs'],
  });

/**
 * Parse a "host:port" bind string.
 *
 * Accepts "host:port", "[ipv6]:port", ":port" (all interfaces) and a bare
 * host (default port).
 *
 * @example
 * parseBind('0.0.0.0:8080'); // { host: '0.0.0.0', port: 8080 }
 * parseBind('[::1]:9000');   // { host: '::1', port: 9000 }
 */
export function parseBind(bind: string): { host: string; port: number } {
  const value = bind.trim();
  if (value.length === 0) {
    throw new ConfigurationError(['bind: must not be empty']);
  }

  let host: string;
  let portText: string | undefined;

  if (value.startsWith('[')) {
    const end = value.indexOf(']');
    if (end === -1) {
      throw new ConfigurationError([`bind: unterminated IPv6 address in '${bind}'`]);
    }
    host = value.slice(1, end);
    const rest = value.slice(end + 1);
    if (rest.length > 0) {
      if (!rest.startsWith(':')) {
        throw new ConfigurationError([`bind: unexpected '${rest}' after IPv6 address`]);
      }
      portText = rest.slice(1);
    }
  } else {
    const colon = value.lastIndexOf(':');
    if (colon === -1) {
      host = value;
    } else if (value.indexOf(':') !== colon) {
      // Bare IPv6 address without brackets
      host = value;
    } else {
      host = value.slice(0, colon);
      portText = value.slice(colon + 1);
    }
  }

  if (host.length === 0) {
    host = DEFAULT_HOST;
  }

  if (portText === undefined) {
    return { host, port: DEFAULT_PORT };
  }

  const port = Number(portText);
  if (!/^\d+$/.test(portText) || port > 65_535) {
    throw new ConfigurationError([`bind: invalid port '${portText}'`]);
  }
  return { host, port };
}

type EnvReader = (name: string) => string | undefined;

function readEnv(env: NodeJS.ProcessEnv): EnvReader {
  return (name) => {
    const value = env[name];
    if (value === undefined || value.trim().length === 0) {
      return undefined;
    }
    return value.trim();
  };
}

function parseEnvCount(read: EnvReader, name: string, issues: string[]): number | undefined {
  const raw = read(name);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(parsed)) {
    issues.push(`${name}: must be a non-negative integer, got '${raw}'`);
    return undefined;
  }
  return parsed;
}

/**
 * Seconds may be fractional; the result is whole milliseconds.
 */
function parseEnvSeconds(read: EnvReader, name: string, issues: string[]): number | undefined {
  const raw = read(name);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    issues.push(`${name}: must be a non-negative number of seconds, got '${raw}'`);
    return undefined;
  }
  return Math.round(parsed * 1000);
}

/**
 * Read configuration overrides from environment variables.
 *
 * Timeouts are given in seconds, as on the command line.
 *
 * Environment Variables:
 *   PREFORK_BIND              - "host:port" to bind
 *   PORT                      - Port to bind when PREFORK_BIND is not set
 *   WEB_CONCURRENCY           - Number of workers
 *   PREFORK_WORKER_MODEL      - "process" or "inline"
 *   PREFORK_TIMEOUT           - Worker heartbeat timeout (seconds)
 *   PREFORK_REQUEST_TIMEOUT   - Per-request deadline (seconds)
 *   PREFORK_GRACEFUL_TIMEOUT  - Drain grace period (seconds)
 *   PREFORK_KEEP_ALIVE        - Keep-alive idle timeout (seconds)
 *   PREFORK_MAX_REQUESTS      - Requests before a worker is recycled
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): ServerConfigOverrides {
  const read = readEnv(env);
  const issues: string[] = [];
  const overrides: ServerConfigOverrides = {};

  const bind = read('PREFORK_BIND');
  if (bind !== undefined) {
    overrides.bind = bind;
  } else {
    const port = parseEnvCount(read, 'PORT', issues);
    if (port !== undefined) {
      overrides.port = port;
    }
  }

  const workers = parseEnvCount(read, 'WEB_CONCURRENCY', issues);
  if (workers !== undefined) {
    overrides.workers = workers;
  }

  const workerModel = read('PREFORK_WORKER_MODEL');
  if (workerModel !== undefined) {
    if (workerModel === 'process' || workerModel === 'inline') {
      overrides.workerModel = workerModel;
    } else {
      issues.push(`PREFORK_WORKER_MODEL: must be 'process' or 'inline', got '${workerModel}'`);
    }
  }

  const timeoutMs = parseEnvSeconds(read, 'PREFORK_TIMEOUT', issues);
  if (timeoutMs !== undefined) {
    overrides.timeoutMs = timeoutMs;
  }

  const requestTimeoutMs = parseEnvSeconds(read, 'PREFORK_REQUEST_TIMEOUT', issues);
  if (requestTimeoutMs !== undefined) {
    overrides.requestTimeoutMs = requestTimeoutMs;
  }

  const gracefulTimeoutMs = parseEnvSeconds(read, 'PREFORK_GRACEFUL_TIMEOUT', issues);
  if (gracefulTimeoutMs !== undefined) {
    overrides.gracefulTimeoutMs = gracefulTimeoutMs;
  }

  const keepAliveTimeoutMs = parseEnvSeconds(read, 'PREFORK_KEEP_ALIVE', issues);
  if (keepAliveTimeoutMs !== undefined) {
    overrides.keepAliveTimeoutMs = keepAliveTimeoutMs;
  }

  const maxRequests = parseEnvCount(read, 'PREFORK_MAX_REQUESTS', issues);
  if (maxRequests !== undefined) {
    overrides.maxRequests = maxRequests;
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  return overrides;
}

function applyOverrides(
  base: ServerConfig,
  overrides: ServerConfigOverrides
): Record<string, unknown> {
  const { bind, restartLimit, ...rest } = overrides;
  const merged: Record<string, unknown> = { ...base };

  if (bind !== undefined) {
    const parsed = parseBind(bind);
    merged.host = parsed.host;
    merged.port = parsed.port;
  }

  for (const [key, value] of Object.entries(rest)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  merged.restartLimit = { ...base.restartLimit, ...restartLimit };
  return merged;
}

/**
 * Load, validate and freeze the server configuration.
 *
 * @param overrides - Explicit settings (highest precedence)
 * @param env - Environment to read (default: process.env)
 * @throws ConfigurationError listing every invalid setting
 */
export function loadServerConfig(
  overrides: ServerConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ServerConfig {
  const fromEnv = applyOverrides(DEFAULT_SERVER_CONFIG, readEnvOverrides(env));
  const result = serverConfigSchema.safeParse(fromEnv);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }

  const merged = serverConfigSchema.safeParse(applyOverrides(result.data, overrides));
  if (!merged.success) {
    throw new ConfigurationError(formatIssues(merged.error));
  }

  return Object.freeze({
    ...merged.data,
    restartLimit: Object.freeze({ ...merged.data.restartLimit }),
  });
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
  });
}
