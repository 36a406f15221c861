/**
 * PreforkServer - Orchestrates the serving lifecycle.
 *
 * Ties a Supervisor to an application and exposes the control plane:
 * - Start (bind, spawn workers, wait until ready)
 * - Rolling reload
 * - Graceful or immediate shutdown, with escalation
 * - Status and health checks
 *
 * @example
 * ```typescript
 * const config = loadServerConfig({ bind: '127.0.0.1:8080', workers: 4 });
 * const server = new PreforkServer(config, { module: './dist/app.js' });
 *
 * await server.start();
 * installSignalHandlers(server);
 * await server.wait();
 * ```
 */

import type { ServerConfig } from '../config/types.js';
import type { SupervisorEventEmitter } from '../events/event-emitter.js';
import { SupervisorEventNames } from '../events/event-names.js';
import type { ListenerAddress } from '../listener/listener.js';
import { createLogger, errorMessage } from '../logging/index.js';
import { type AppSource, createLauncher } from '../process/launcher-factory.js';
import { Supervisor } from '../supervisor/supervisor.js';
import { ConfigurationError, ReloadError } from '../types/errors.js';
import { type ControlCommand, ControlCommands } from './control.js';
import { ShutdownController, type ShutdownHandler, type ShutdownMode } from './shutdown-controller.js';
import {
  type HealthCheckResult,
  type PreforkServerOptions,
  type ServerState,
  ServerStates,
  type ServerStatus,
} from './types.js';

const log = createLogger({ component: 'server' });

export class PreforkServer {
  private readonly supervisor: Supervisor;
  private readonly shutdownController = new ShutdownController();

  private state: ServerState = ServerStates.INITIALIZED;
  private startTime: number | null = null;
  private stopping: Promise<void> | null = null;

  /**
   * Create a new PreforkServer.
   *
   * @param config - Loaded server configuration
   * @param app - Handler function (inline model) or module reference
   * @throws ConfigurationError when the process model is given a handler function
   */
  constructor(
    private readonly config: ServerConfig,
    app: AppSource,
    options: PreforkServerOptions = {}
  ) {
    if (config.workerModel === 'process' && !('module' in app) && !options.launcherFactory) {
      throw new ConfigurationError([
        "workerModel: 'process' requires an application module reference, not a handler function",
      ]);
    }

    this.supervisor = new Supervisor(config, {
      launcherFactory: options.launcherFactory ?? ((listener) => createLauncher(config, app, listener)),
      bind: options.bind,
      emitter: options.emitter,
    });

    this.supervisor.events.on(SupervisorEventNames.SUPERVISOR_FATAL, ({ error }) => {
      log.error(`Fatal supervisor error: ${error.message}`, { operation: 'supervise' });
      this.state = ServerStates.ERROR;
      this.requestShutdown('immediate', 'fatal').catch((shutdownError: unknown) => {
        log.error(`Shutdown failed: ${errorMessage(shutdownError)}`, { operation: 'shutdown' });
      });
    });

    this.shutdownController.onEscalate(() => this.supervisor.terminateWorkers());
  }

  // ==========================================================================
  // Properties
  // ==========================================================================

  /**
   * Get the current server state.
   */
  getState(): ServerState {
    return this.state;
  }

  /**
   * Check if the server is currently running.
   */
  isRunning(): boolean {
    return this.state === ServerStates.RUNNING;
  }

  /**
   * Supervisor lifecycle events.
   */
  get events(): SupervisorEventEmitter {
    return this.supervisor.events;
  }

  /**
   * Bound address, once started.
   */
  address(): ListenerAddress | null {
    return this.supervisor.getListener()?.address ?? null;
  }

  getSupervisor(): Supervisor {
    return this.supervisor;
  }

  // ==========================================================================
  // Lifecycle Methods
  // ==========================================================================

  /**
   * Bind the listener and start every worker.
   *
   * @returns The server instance for chaining
   * @throws BindError, ApplicationLoadError or WorkerCrashError when startup fails
   */
  async start(): Promise<this> {
    if (this.state === ServerStates.RUNNING) {
      throw new Error('PreforkServer is already running');
    }
    if (this.state === ServerStates.STARTING) {
      throw new Error('PreforkServer is already starting');
    }

    this.state = ServerStates.STARTING;
    this.startTime = Date.now();

    try {
      await this.supervisor.start();
    } catch (error) {
      this.state = ServerStates.ERROR;
      log.error(`PreforkServer failed to start: ${errorMessage(error)}`, {
        operation: 'start',
        error_message: errorMessage(error),
      });
      throw error;
    }

    if (this.getState() === ServerStates.STARTING) {
      this.state = ServerStates.RUNNING;
      log.info('PreforkServer started', {
        operation: 'start',
        workers: this.config.workers,
        model: this.config.workerModel,
      });
    }
    return this;
  }

  /**
   * Rolling restart of every worker.
   *
   * @throws ReloadError when not running or a replacement fails to boot
   */
  async reload(): Promise<void> {
    if (this.state !== ServerStates.RUNNING) {
      throw new ReloadError(`Cannot reload while ${this.state}`);
    }
    await this.supervisor.reload();
  }

  /**
   * Stop serving.
   *
   * graceful drains workers within gracefulTimeoutMs; immediate aborts
   * in-flight requests. Requesting graceful twice escalates to immediate.
   */
  shutdown(mode: ShutdownMode = 'graceful'): Promise<void> {
    return this.requestShutdown(mode, 'api');
  }

  /**
   * Execute a control command.
   */
  async handleCommand(command: ControlCommand, source = 'api'): Promise<void> {
    switch (command) {
      case ControlCommands.RELOAD:
        await this.reload();
        return;
      case ControlCommands.GRACEFUL_SHUTDOWN:
        await this.requestShutdown('graceful', source);
        return;
      case ControlCommands.IMMEDIATE_SHUTDOWN:
        await this.requestShutdown('immediate', source);
        return;
    }
  }

  /**
   * Register a handler to be called during shutdown.
   */
  onShutdown(handler: ShutdownHandler): void {
    this.shutdownController.onShutdown(handler);
  }

  /**
   * Resolve once the server has stopped; reject with the fatal error when it
   * stopped because of one.
   */
  async wait(): Promise<void> {
    try {
      await this.supervisor.wait();
    } finally {
      if (this.stopping) {
        await this.stopping;
      }
    }
  }

  private requestShutdown(mode: ShutdownMode, source: string): Promise<void> {
    const first = !this.shutdownController.isRequested;
    this.shutdownController.trigger(source, mode);
    if (first || !this.stopping) {
      this.stopping = this.performShutdown(this.shutdownController.mode ?? mode);
    }
    return this.stopping;
  }

  private async performShutdown(mode: ShutdownMode): Promise<void> {
    if (this.state !== ServerStates.ERROR) {
      this.state = ServerStates.SHUTTING_DOWN;
    }
    const graceMs = mode === 'immediate' ? 0 : this.config.gracefulTimeoutMs;

    log.info(`Starting ${mode} shutdown...`, { operation: 'shutdown', grace_ms: graceMs });
    try {
      await this.supervisor.shutdown(graceMs);
    } finally {
      await this.shutdownController.executeHandlers();
    }

    if (this.getState() !== ServerStates.ERROR && !this.supervisor.getFatalError()) {
      this.state = ServerStates.STOPPED;
      log.info('PreforkServer shutdown completed', { operation: 'shutdown' });
    } else {
      this.state = ServerStates.ERROR;
    }
  }

  // ==========================================================================
  // Status Methods
  // ==========================================================================

  /**
   * Perform a health check.
   */
  healthCheck(): HealthCheckResult {
    if (this.state !== ServerStates.RUNNING) {
      return {
        healthy: false,
        error: `Server not running (state: ${this.state})`,
      };
    }

    const status = this.status();
    if (status.supervisor.capacity === 0) {
      return { healthy: false, error: 'No worker is ready' };
    }
    return { healthy: true, status };
  }

  /**
   * Get detailed server status.
   */
  status(): ServerStatus {
    return {
      state: this.state,
      running: this.state === ServerStates.RUNNING,
      uptimeMs: this.startTime ? Date.now() - this.startTime : 0,
      supervisor: this.supervisor.status(),
    };
  }
}
