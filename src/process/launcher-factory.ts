/**
 * Launcher selection by execution model.
 */

import type { ServerConfig } from '../config/types.js';
import type { Handler } from '../http/handler.js';
import type { ConnectionSource } from '../listener/connection-queue.js';
import { ConfigurationError } from '../types/errors.js';
import { loadApplication } from '../worker/app-loader.js';
import type { WorkerProcessOptions } from '../worker/ipc.js';
import { ForkWorkerLauncher } from './fork-launcher.js';
import { InlineWorkerLauncher } from './inline-launcher.js';
import type { WorkerLauncher } from './types.js';

/**
 * Where workers get the application from.
 *
 * A handler function can only be shared with inline workers; worker
 * processes load the application themselves from a module reference.
 */
export type AppSource = { handler: Handler } | { module: string; cwd?: string };

/**
 * Worker settings derived from the server configuration.
 */
export function workerOptionsFromConfig(config: ServerConfig): WorkerProcessOptions {
  return {
    requestTimeoutMs: config.requestTimeoutMs,
    keepAliveTimeoutMs: config.keepAliveTimeoutMs,
    maxRequestsPerConnection: config.maxRequestsPerConnection,
    workerConnections: config.workerConnections,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    maxRequests: config.maxRequests,
    maxRequestsJitter: config.maxRequestsJitter,
    gracefulTimeoutMs: config.gracefulTimeoutMs,
    maxHeaderSize: config.maxHeaderSize,
  };
}

/**
 * Create the launcher for config.workerModel.
 *
 * @throws ConfigurationError when the process model is given a handler
 *   function instead of a module reference
 * @throws ApplicationLoadError when an inline module cannot be loaded
 */
export async function createLauncher(
  config: ServerConfig,
  app: AppSource,
  source: ConnectionSource
): Promise<WorkerLauncher> {
  const worker = workerOptionsFromConfig(config);

  if (config.workerModel === 'process') {
    if (!('module' in app)) {
      throw new ConfigurationError([
        "workerModel: 'process' requires an application module reference, not a handler function",
      ]);
    }
    return new ForkWorkerLauncher({ source, app: app.module, cwd: app.cwd, worker });
  }

  const handler = 'handler' in app ? app.handler : await loadApplication(app.module, app.cwd);
  return new InlineWorkerLauncher(source, handler, worker);
}
