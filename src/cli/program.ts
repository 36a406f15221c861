/**
 * Command-line interface.
 *
 *   prefork-server [options] <app>
 *
 * <app> is "path/to/module[:export]". Timeouts are given in seconds and
 * converted to the milliseconds ServerConfig uses.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import type { ServerConfigOverrides, WorkerModel } from '../config/types.js';
import type { LogLevel } from '../logging/index.js';
import type { CliRuntime } from './runtime.js';

const WORKER_MODELS: readonly WorkerModel[] = ['process', 'inline'];
const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Parsed command-line options.
 */
export interface CliOptions {
  bind?: string;
  workers?: number;
  timeout?: number;
  requestTimeout?: number;
  gracefulTimeout?: number;
  keepAlive?: number;
  maxRequests?: number;
  maxRequestsJitter?: number;
  workerConnections?: number;
  workerModel?: WorkerModel;
  logLevel?: LogLevel;
}

/**
 * What the serve action receives.
 */
export interface ServeRequest {
  app: string;
  overrides: ServerConfigOverrides;
  logLevel?: LogLevel;
}

export type CliProgramContext = {
  name: string;
  version: string;
  runtime: CliRuntime;
  serve: (request: ServeRequest) => Promise<void>;
};

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (value.trim().length === 0 || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number of seconds.');
  }
  return parsed;
}

function secondsToMs(seconds: number | undefined): number | undefined {
  return seconds === undefined ? undefined : Math.round(seconds * 1000);
}

/**
 * Convert parsed options into configuration overrides.
 */
export function resolveCliOverrides(options: CliOptions): ServerConfigOverrides {
  const overrides: ServerConfigOverrides = {};

  if (options.bind !== undefined) {
    overrides.bind = options.bind;
  }
  if (options.workers !== undefined) {
    overrides.workers = options.workers;
  }
  if (options.workerModel !== undefined) {
    overrides.workerModel = options.workerModel;
  }

  const timeoutMs = secondsToMs(options.timeout);
  if (timeoutMs !== undefined) {
    overrides.timeoutMs = timeoutMs;
  }
  const requestTimeoutMs = secondsToMs(options.requestTimeout);
  if (requestTimeoutMs !== undefined) {
    overrides.requestTimeoutMs = requestTimeoutMs;
  }
  const gracefulTimeoutMs = secondsToMs(options.gracefulTimeout);
  if (gracefulTimeoutMs !== undefined) {
    overrides.gracefulTimeoutMs = gracefulTimeoutMs;
  }
  const keepAliveTimeoutMs = secondsToMs(options.keepAlive);
  if (keepAliveTimeoutMs !== undefined) {
    overrides.keepAliveTimeoutMs = keepAliveTimeoutMs;
  }

  if (options.maxRequests !== undefined) {
    overrides.maxRequests = options.maxRequests;
  }
  if (options.maxRequestsJitter !== undefined) {
    overrides.maxRequestsJitter = options.maxRequestsJitter;
  }
  if (options.workerConnections !== undefined) {
    overrides.workerConnections = options.workerConnections;
  }
  return overrides;
}

export function createCliProgram(ctx: CliProgramContext): Command {
  const program = new Command();

  program.configureOutput({
    writeOut: (str) => ctx.runtime.writeOut(str),
    writeErr: (str) => ctx.runtime.writeErr(str),
  });

  program
    .name(ctx.name)
    .description('Pre-fork HTTP/1.1 server: one listener, a supervised pool of workers')
    .version(ctx.version)
    .argument('<app>', 'application to serve, "path/to/module[:export]"')
    .option('-b, --bind <address>', 'address to bind, "host:port" (default: 0.0.0.0:8080)')
    .option('-w, --workers <count>', 'number of workers', parseCount)
    .option('-t, --timeout <seconds>', 'kill workers silent for this long', parseSeconds)
    .option('--request-timeout <seconds>', 'per-request deadline', parseSeconds)
    .option('--graceful-timeout <seconds>', 'grace period for draining workers', parseSeconds)
    .option('--keep-alive <seconds>', 'idle keep-alive timeout', parseSeconds)
    .option('--max-requests <count>', 'requests before a worker is recycled (0 disables)', parseCount)
    .option('--max-requests-jitter <count>', 'random extra requests added to --max-requests', parseCount)
    .option('--worker-connections <count>', 'concurrent connections per worker', parseCount)
    .addOption(
      new Option('--worker-model <model>', 'how workers run').choices(WORKER_MODELS)
    )
    .addOption(new Option('--log-level <level>', 'minimum log level').choices(LOG_LEVELS))
    .action(async (app: string, options: CliOptions) => {
      await ctx.serve({
        app,
        overrides: resolveCliOverrides(options),
        logLevel: options.logLevel,
      });
    });

  return program;
}
