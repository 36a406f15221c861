#!/usr/bin/env node

/**
 * Pre-fork HTTP server.
 *
 * Binds one listening socket, starts a supervised pool of workers and
 * serves the given application until told to stop.
 *
 * Usage:
 *   prefork-server [options] <app>
 *   prefork-server --bind 0.0.0.0:8080 --workers 4 ./dist/app.js:handler
 *
 * Environment Variables:
 *   PREFORK_BIND              - "host:port" to bind (default: 0.0.0.0:8080)
 *   PORT                      - Port to bind when PREFORK_BIND is not set
 *   WEB_CONCURRENCY           - Number of workers (default: 1)
 *   PREFORK_WORKER_MODEL      - "process" (default) or "inline"
 *   PREFORK_TIMEOUT           - Worker heartbeat timeout in seconds
 *   PREFORK_REQUEST_TIMEOUT   - Per-request deadline in seconds
 *   PREFORK_GRACEFUL_TIMEOUT  - Drain grace period in seconds
 *   PREFORK_KEEP_ALIVE        - Idle keep-alive timeout in seconds
 *   PREFORK_MAX_REQUESTS      - Requests before a worker is recycled
 *   PREFORK_LOG_LEVEL         - Log level: trace, debug, info, warn, error
 *   PREFORK_ENV               - Environment: development, test, production
 *
 * Signals:
 *   SIGHUP           - Rolling reload of every worker
 *   SIGTERM          - Graceful shutdown (twice: immediate)
 *   SIGINT, SIGQUIT  - Immediate shutdown
 *   SIGUSR1          - Log server status
 */

import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { CommanderError } from 'commander';
import { createCliProgram, createNodeRuntime, type ServeRequest } from '../src/cli/index.js';
import { loadServerConfig } from '../src/config/index.js';
import type { ServerConfig } from '../src/config/types.js';
import { createRootLogger, errorMessage, setRootLogger } from '../src/logging/index.js';
import { installSignalHandlers, PreforkServer } from '../src/server/index.js';

// =============================================================================
// Logging
// =============================================================================

const log = createRootLogger({ name: 'prefork-server' });
setRootLogger(log);

const isProduction = (): boolean =>
  process.env.PREFORK_ENV === 'production' || process.env.NODE_ENV === 'production';

function readVersion(): string {
  // bin/server.ts from sources, dist/bin/server.js once built
  for (const relative of ['../package.json', '../../package.json']) {
    const file = fileURLToPath(new URL(relative, import.meta.url));
    if (!existsSync(file)) {
      continue;
    }
    const manifest: unknown = JSON.parse(readFileSync(file, 'utf8'));
    if (
      typeof manifest === 'object' &&
      manifest !== null &&
      'version' in manifest &&
      typeof manifest.version === 'string'
    ) {
      return manifest.version;
    }
  }
  return '0.0.0';
}

// =============================================================================
// Banner Display
// =============================================================================

function showBanner(config: ServerConfig, app: string): void {
  const banner = ['='.repeat(60), 'Starting pre-fork HTTP server', '='.repeat(60)];

  const info = {
    environment: process.env.PREFORK_ENV ?? process.env.NODE_ENV ?? 'development',
    runtime: `Node.js ${process.version}`,
    pid: process.pid,
    app,
    bind: `${config.host}:${config.port}`,
    workers: config.workers,
    workerModel: config.workerModel,
    timeoutMs: config.timeoutMs,
    gracefulTimeoutMs: config.gracefulTimeoutMs,
    maxRequests: config.maxRequests,
    productionOptimizations: isProduction(),
  };

  log.info({ component: 'server', ...info }, banner.join('\n'));
}

function showSuccessBanner(server: PreforkServer): void {
  const address = server.address();
  const where = address ? `${address.host}:${address.port}` : 'unknown address';
  log.info(
    { component: 'server', operation: 'startup' },
    [
      '',
      '='.repeat(60),
      `Serving on ${where}`,
      `  Workers: ${server.status().supervisor.capacity} ready`,
      '  SIGHUP reloads, SIGTERM drains, SIGINT stops',
      '',
      'Press Ctrl+C to stop',
      '='.repeat(60),
    ].join('\n')
  );
}

// =============================================================================
// Serve
// =============================================================================

async function serve(request: ServeRequest): Promise<number> {
  if (request.logLevel) {
    log.level = request.logLevel;
  }

  let config: ServerConfig;
  let server: PreforkServer;
  try {
    config = loadServerConfig(request.overrides);
    server = new PreforkServer(config, { module: request.app });
  } catch (error) {
    log.error({ component: 'server', operation: 'config', error: errorMessage(error) }, errorMessage(error));
    return 1;
  }

  showBanner(config, request.app);

  const removeSignalHandlers = installSignalHandlers(server);
  const onStatusRequest = (): void => {
    log.info({ component: 'server', operation: 'status', ...server.status() }, 'Server status requested');
  };
  process.on('SIGUSR1', onStatusRequest);

  try {
    await server.start();
    showSuccessBanner(server);

    await server.wait();

    log.info({ component: 'server', operation: 'shutdown' }, 'Server terminated gracefully');
    return 0;
  } catch (error) {
    log.error(
      {
        component: 'server',
        operation: 'serve',
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      },
      `Server stopped: ${errorMessage(error)}`
    );
    return 1;
  } finally {
    removeSignalHandlers();
    process.off('SIGUSR1', onStatusRequest);
  }
}

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<number> {
  let exitCode = 0;

  const program = createCliProgram({
    name: 'prefork-server',
    version: readVersion(),
    runtime: createNodeRuntime(),
    serve: async (request) => {
      exitCode = await serve(request);
    },
  });
  program.exitOverride();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}

// Run the server
main()
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error) => {
    log.fatal({ component: 'server', error }, 'Unhandled error');
    process.exit(2);
  });
