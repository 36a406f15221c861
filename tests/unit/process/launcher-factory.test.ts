/**
 * Launcher selection tests.
 */

import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { loadServerConfig } from '../../../src/config/server-config.js';
import { text } from '../../../src/http/responses.js';
import { ConnectionQueue } from '../../../src/listener/connection-queue.js';
import { ForkWorkerLauncher } from '../../../src/process/fork-launcher.js';
import { InlineWorkerLauncher } from '../../../src/process/inline-launcher.js';
import { createLauncher, workerOptionsFromConfig } from '../../../src/process/launcher-factory.js';
import { ApplicationLoadError, ConfigurationError } from '../../../src/types/errors.js';

const fixtures = fileURLToPath(new URL('../../fixtures/apps/', import.meta.url));
const handler = () => text({ status: 200 });

describe('workerOptionsFromConfig', () => {
  it('copies the per-worker settings', () => {
    const config = loadServerConfig({ requestTimeoutMs: 5_000, maxRequests: 100, maxRequestsJitter: 10 }, {});
    expect(workerOptionsFromConfig(config)).toEqual({
      requestTimeoutMs: 5_000,
      keepAliveTimeoutMs: 2_000,
      maxRequestsPerConnection: 100,
      workerConnections: 1_000,
      heartbeatIntervalMs: 1_000,
      maxRequests: 100,
      maxRequestsJitter: 10,
      gracefulTimeoutMs: 30_000,
      maxHeaderSize: 16_384,
    });
  });
});

describe('createLauncher', () => {
  const source = new ConnectionQueue();

  it('creates an inline launcher from a handler', async () => {
    const config = loadServerConfig({ workerModel: 'inline' }, {});
    const launcher = await createLauncher(config, { handler }, source);
    expect(launcher).toBeInstanceOf(InlineWorkerLauncher);
  });

  it('loads the module for an inline launcher', async () => {
    const config = loadServerConfig({ workerModel: 'inline' }, {});
    const launcher = await createLauncher(config, { module: 'default-app', cwd: fixtures }, source);
    expect(launcher.model).toBe('inline');
  });

  it('propagates inline load failures', async () => {
    const config = loadServerConfig({ workerModel: 'inline' }, {});
    await expect(createLauncher(config, { module: 'missing', cwd: fixtures }, source)).rejects.toBeInstanceOf(
      ApplicationLoadError
    );
  });

  it('creates a fork launcher from a module reference', async () => {
    const config = loadServerConfig({ workerModel: 'process' }, {});
    const launcher = await createLauncher(config, { module: './app.js' }, source);
    expect(launcher).toBeInstanceOf(ForkWorkerLauncher);
    expect(launcher.model).toBe('process');
  });

  it('rejects a handler function for the process model', async () => {
    const config = loadServerConfig({ workerModel: 'process' }, {});
    await expect(createLauncher(config, { handler }, source)).rejects.toThrow(ConfigurationError);
  });
});
