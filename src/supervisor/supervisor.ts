/**
 * Supervisor - owns the Listener and the worker table.
 *
 * Binds the listening socket once, keeps `workers` workers alive in fixed
 * slots, replaces crashed and hung workers under a restart-rate ceiling,
 * performs rolling reloads and coordinates shutdown.
 *
 * All mutations of the worker table happen on the event loop: the monitor
 * tick is synchronous, and reload/shutdown only touch the table between
 * awaits.
 *
 * @example
 * ```typescript
 * const supervisor = new Supervisor(config, {
 *   launcherFactory: (listener) => new InlineWorkerLauncher(listener, handler),
 * });
 * await supervisor.start();
 * await supervisor.reload();
 * await supervisor.shutdown(5000);
 * ```
 */

import type { ServerConfig } from '../config/types.js';
import { SupervisorEventEmitter } from '../events/event-emitter.js';
import { SupervisorEventNames } from '../events/event-names.js';
import { Listener, type ListenerOptions } from '../listener/listener.js';
import { createLogger, errorMessage } from '../logging/index.js';
import type { WorkerExitInfo, WorkerLauncher } from '../process/types.js';
import {
  PreforkError,
  ReloadError,
  RestartStormError,
  WorkerCrashError,
} from '../types/errors.js';
import type { WorkerStatus } from '../worker/types.js';
import { RestartLimiter } from './restart-limiter.js';
import type {
  SupervisorState,
  SupervisorStatus,
  WorkerSnapshot,
  WorkerState,
} from './types.js';

const log = createLogger({ component: 'supervisor' });

/** Extra time a draining worker gets past its grace period before it is killed */
const KILL_MARGIN_MS = 1_000;

export type LauncherFactory = (listener: Listener) => WorkerLauncher | Promise<WorkerLauncher>;

export type BindFunction = (host: string, port: number, options: ListenerOptions) => Promise<Listener>;

/**
 * Collaborators of a Supervisor.
 */
export interface SupervisorOptions {
  /** Builds the launcher once the Listener is bound */
  launcherFactory: LauncherFactory;

  /** Binds the Listener (default: Listener.bind) */
  bind?: BindFunction;

  /** Event emitter to publish lifecycle events on */
  emitter?: SupervisorEventEmitter;

  /** Clock used for heartbeat ages and the restart window */
  now?: () => number;
}

function timeout(ms: number): { expired: Promise<'timeout'>; cancel: () => void } {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), ms);
  });
  return { expired, cancel: () => clearTimeout(timer) };
}

function isServing(status: WorkerStatus): boolean {
  return status === 'ready' || status === 'busy';
}

export class Supervisor {
  readonly events: SupervisorEventEmitter;

  private readonly launcherFactory: LauncherFactory;
  private readonly bind: BindFunction;
  private readonly now: () => number;
  private readonly limiter: RestartLimiter;

  private state: SupervisorState = 'idle';
  private listener: Listener | null = null;
  private binding: Promise<Listener> | null = null;
  private launcher: WorkerLauncher | null = null;
  private readonly workers = new Map<string, WorkerState>();
  private monitorTimer: ReturnType<typeof setInterval> | null = null;
  private nextWorkerNumber = 1;
  private generation = 0;

  private reloading: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private fatalError: Error | null = null;
  private readonly stopped: Promise<void>;
  private resolveStopped: (() => void) | null = null;

  constructor(
    private readonly config: ServerConfig,
    options: SupervisorOptions
  ) {
    this.launcherFactory = options.launcherFactory;
    this.bind = options.bind ?? ((host, port, listenerOptions) => Listener.bind(host, port, listenerOptions));
    this.events = options.emitter ?? new SupervisorEventEmitter();
    this.now = options.now ?? Date.now;
    this.limiter = new RestartLimiter(config.restartLimit, this.now);
    this.stopped = new Promise<void>((resolve) => {
      this.resolveStopped = resolve;
    });
  }

  // ==========================================================================
  // Properties
  // ==========================================================================

  getState(): SupervisorState {
    return this.state;
  }

  /**
   * The bound Listener, once started.
   */
  getListener(): Listener | null {
    return this.listener;
  }

  /**
   * The error that stopped the supervisor, if any.
   */
  getFatalError(): Error | null {
    return this.fatalError;
  }

  status(): SupervisorStatus {
    const now = this.now();
    const workers: WorkerSnapshot[] = [...this.workers.values()]
      .sort((a, b) => a.slot - b.slot || a.generation - b.generation)
      .map((worker) => ({
        workerId: worker.workerId,
        slot: worker.slot,
        generation: worker.generation,
        pid: worker.handle.pid,
        status: worker.status,
        retiring: worker.retiring,
        uptimeMs: now - worker.startedAt,
        heartbeatAgeMs: now - worker.lastHeartbeatAt,
      }));

    return {
      state: this.state,
      model: this.launcher?.model ?? this.config.workerModel,
      address: this.listener?.address ?? null,
      desiredWorkers: this.config.workers,
      capacity: workers.filter((worker) => isServing(worker.status)).length,
      generation: this.generation,
      restarts: this.limiter.count(),
      workers,
    };
  }

  // ==========================================================================
  // Lifecycle Methods
  // ==========================================================================

  /**
   * Bind the Listener and start every worker.
   *
   * Resolves once all workers are ready.
   *
   * @throws BindError when the address cannot be bound (no worker is started)
   * @throws WorkerCrashError when a worker fails to boot within bootTimeoutMs
   */
  async start(): Promise<void> {
    if (this.state !== 'idle') {
      throw new Error(`Supervisor cannot start from state '${this.state}'`);
    }
    this.setState('starting');

    const { host, port, backlog, workerModel } = this.config;
    this.binding = this.bind(host, port, {
      backlog,
      pauseOnConnect: workerModel === 'process',
    });
    try {
      this.listener = await this.binding;
    } catch (error) {
      this.fatalError = error instanceof Error ? error : new Error(String(error));
      if (!this.stopping) {
        this.setState('failed');
        this.resolveStopped?.();
      }
      throw error;
    } finally {
      this.binding = null;
    }

    if (this.getState() !== 'starting') {
      // Shut down while binding; performShutdown closes the listener
      await this.stopping;
      return;
    }

    try {
      this.launcher = await this.launcherFactory(this.listener);
    } catch (error) {
      await this.abortStart(error);
      throw error;
    }

    if (this.getState() !== 'starting') {
      return;
    }

    const launcher = this.launcher;
    const initial = Array.from({ length: this.config.workers }, (_, slot) =>
      this.spawnWorker(launcher, slot)
    );
    this.startMonitor();

    const ready = await Promise.all(
      initial.map((worker) => this.waitUntilReady(worker, this.config.bootTimeoutMs))
    );
    if (this.getState() !== 'starting') {
      return;
    }

    const failed = initial.find((_, index) => !ready[index]);
    if (failed) {
      const exit = failed.handle.exitInfo;
      const error = new WorkerCrashError(
        failed.workerId,
        exit?.code ?? null,
        exit?.signal ?? null,
        exit?.error ?? `not ready within ${this.config.bootTimeoutMs}ms`
      );
      await this.abortStart(error);
      throw error;
    }

    this.setState('running');
    const address = this.listener.address;
    log.info(`Started ${this.config.workers} ${launcher.model} workers`, {
      operation: 'start',
      host: address.host,
      port: address.port,
      workers: this.config.workers,
      model: launcher.model,
    });
    this.events.emit(SupervisorEventNames.SUPERVISOR_STARTED, {
      address,
      workers: this.config.workers,
      model: launcher.model,
      timestamp: new Date(),
    });
  }

  /**
   * Rolling restart.
   *
   * Starts one replacement per slot, waits for all of them to be ready,
   * then drains the previous workers one at a time. Concurrent calls share
   * one run.
   *
   * @throws ReloadError when a replacement fails to boot; the previous
   *   workers keep serving
   */
  reload(): Promise<void> {
    if (this.reloading) {
      return this.reloading;
    }
    if (this.state !== 'running') {
      return Promise.reject(new ReloadError(`Cannot reload while ${this.state}`));
    }
    this.reloading = this.performReload().finally(() => {
      this.reloading = null;
    });
    return this.reloading;
  }

  /**
   * Drain every worker, then close the Listener.
   *
   * Workers still alive when graceMs elapses are terminated. Idempotent.
   */
  shutdown(graceMs: number = this.config.gracefulTimeoutMs): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.performShutdown(graceMs);
    }
    return this.stopping;
  }

  /**
   * Kill every worker now. Escalates a graceful shutdown in progress.
   */
  terminateWorkers(): void {
    for (const worker of this.workers.values()) {
      if (!worker.handle.exited) {
        this.terminateWorker(worker);
      }
    }
  }

  /**
   * Resolve when the supervisor has stopped cleanly; reject with the fatal
   * error (bind failure, restart storm, failed boot) otherwise.
   */
  async wait(): Promise<void> {
    await this.stopped;
    if (this.fatalError) {
      throw this.fatalError;
    }
  }

  // ==========================================================================
  // Worker table
  // ==========================================================================

  private spawnWorker(launcher: WorkerLauncher, slot: number): WorkerState {
    const workerId = `worker-${this.nextWorkerNumber++}`;
    const handle = launcher.spawn(workerId);
    const now = this.now();
    const worker: WorkerState = {
      workerId,
      slot,
      generation: this.generation,
      handle,
      status: 'starting',
      startedAt: now,
      lastHeartbeatAt: now,
      retiring: false,
      drainRequested: false,
      terminateRequested: false,
    };
    this.workers.set(workerId, worker);

    handle.on('status', (status) => this.onWorkerStatus(worker, status));
    handle.on('heartbeat', () => {
      worker.lastHeartbeatAt = this.now();
    });
    handle.once('exit', (info) => this.onWorkerExit(worker, info));

    log.debug(`Spawned ${workerId} in slot ${slot}`, {
      operation: 'spawn',
      worker_id: workerId,
      slot,
      pid: handle.pid,
      generation: this.generation,
    });
    this.events.emit(SupervisorEventNames.WORKER_SPAWNED, this.workerPayload(worker));
    return worker;
  }

  private onWorkerStatus(worker: WorkerState, status: WorkerStatus): void {
    const previous = worker.status;
    if (previous === status) {
      return;
    }
    worker.status = status;
    if (isServing(status)) {
      worker.lastHeartbeatAt = this.now();
    }

    this.events.emit(SupervisorEventNames.WORKER_STATUS, {
      ...this.workerPayload(worker),
      status,
      previous,
    });

    // A worker draining on its own is recycling; start its successor now
    if (status === 'draining' && !worker.drainRequested && !worker.retiring && this.state === 'running') {
      worker.retiring = true;
      log.info(`${worker.workerId} is recycling, starting replacement`, {
        operation: 'recycle',
        worker_id: worker.workerId,
        slot: worker.slot,
      });
      this.respawn(worker.slot);
    }
  }

  private onWorkerExit(worker: WorkerState, info: WorkerExitInfo): void {
    this.workers.delete(worker.workerId);

    const requested =
      worker.retiring ||
      worker.drainRequested ||
      (info.reason === 'terminated' && worker.terminateRequested);
    const expected = requested || info.reason === 'drained' || info.reason === 'recycled';

    this.events.emit(SupervisorEventNames.WORKER_EXITED, {
      ...this.workerPayload(worker),
      exit: info,
      expected,
    });

    if (this.state !== 'running' && this.state !== 'reloading') {
      return;
    }

    if (expected) {
      log.info(`${worker.workerId} exited (${info.reason})`, {
        operation: 'exit',
        worker_id: worker.workerId,
        slot: worker.slot,
        reason: info.reason,
      });
      if (!worker.retiring && this.state === 'running') {
        this.respawn(worker.slot);
      }
      return;
    }

    const crash = new WorkerCrashError(worker.workerId, info.code, info.signal, info.error);
    log.error(crash.message, {
      operation: 'exit',
      worker_id: worker.workerId,
      slot: worker.slot,
      code: info.code,
      signal: info.signal,
      error_type: crash.errorType,
    });

    if (this.recordRestart() && !worker.retiring && this.state === 'running') {
      this.respawn(worker.slot);
    }
  }

  private respawn(slot: number): void {
    if (this.launcher) {
      this.spawnWorker(this.launcher, slot);
    }
  }

  /**
   * Count a restart; on a restart storm, fail the supervisor.
   *
   * @returns false when the ceiling was exceeded
   */
  private recordRestart(): boolean {
    if (this.limiter.record()) {
      return true;
    }
    const { maxRestarts, windowMs } = this.config.restartLimit;
    this.fail(new RestartStormError(maxRestarts + 1, windowMs));
    return false;
  }

  private waitUntilReady(worker: WorkerState, timeoutMs: number): Promise<boolean> {
    if (isServing(worker.status)) {
      return Promise.resolve(true);
    }
    if (worker.handle.exited) {
      return Promise.resolve(false);
    }

    return new Promise<boolean>((resolve) => {
      const { handle } = worker;
      const settle = (ready: boolean): void => {
        clearTimeout(timer);
        handle.off('status', onStatus);
        handle.off('exit', onExit);
        resolve(ready);
      };
      const onStatus = (status: WorkerStatus): void => {
        if (isServing(status)) {
          settle(true);
        }
      };
      const onExit = (): void => settle(false);
      const timer = setTimeout(() => settle(false), timeoutMs);

      handle.on('status', onStatus);
      handle.on('exit', onExit);
    });
  }

  /**
   * Resolve once the worker exits, killing it when it outlives graceMs.
   */
  private async waitForExit(worker: WorkerState, graceMs: number): Promise<void> {
    if (worker.handle.exited) {
      return;
    }
    const deadline = timeout(graceMs + KILL_MARGIN_MS);
    const outcome = await Promise.race([worker.handle.wait(), deadline.expired]);
    deadline.cancel();
    if (outcome === 'timeout') {
      this.terminateWorker(worker);
      await worker.handle.wait();
    }
  }

  private drainWorker(worker: WorkerState, graceMs: number): void {
    worker.retiring = true;
    worker.drainRequested = true;
    worker.handle.drain(graceMs);
  }

  private terminateWorker(worker: WorkerState): void {
    worker.retiring = true;
    worker.terminateRequested = true;
    worker.handle.terminate();
  }

  private workerPayload(worker: WorkerState): {
    workerId: string;
    slot: number;
    pid: number | null;
    timestamp: Date;
  } {
    return {
      workerId: worker.workerId,
      slot: worker.slot,
      pid: worker.handle.pid,
      timestamp: new Date(),
    };
  }

  // ==========================================================================
  // Monitor
  // ==========================================================================

  private startMonitor(): void {
    this.monitorTimer = setInterval(() => this.tick(), this.config.monitorIntervalMs);
    this.monitorTimer.unref?.();
  }

  private stopMonitor(): void {
    if (this.monitorTimer) {
      clearInterval(this.monitorTimer);
      this.monitorTimer = null;
    }
  }

  /**
   * One monitor pass: kill hung workers, refill empty slots.
   */
  private tick(): void {
    if (this.state !== 'running' && this.state !== 'reloading') {
      return;
    }
    const now = this.now();

    for (const worker of [...this.workers.values()]) {
      if (worker.retiring || worker.handle.exited) {
        continue;
      }
      if (worker.status === 'starting') {
        const bootAgeMs = now - worker.startedAt;
        if (bootAgeMs > this.config.bootTimeoutMs && this.state === 'running') {
          this.replaceHungWorker(worker, `did not boot within ${this.config.bootTimeoutMs}ms`, bootAgeMs);
        }
        continue;
      }
      const heartbeatAgeMs = now - worker.lastHeartbeatAt;
      if (heartbeatAgeMs > this.config.timeoutMs) {
        this.replaceHungWorker(worker, `no heartbeat for ${heartbeatAgeMs}ms`, heartbeatAgeMs);
      }
    }

    if (this.state !== 'running' || !this.launcher) {
      return;
    }
    for (let slot = 0; slot < this.config.workers; slot++) {
      if (!this.hasLiveWorker(slot)) {
        log.warn(`Slot ${slot} is empty, spawning a worker`, { operation: 'monitor', slot });
        this.spawnWorker(this.launcher, slot);
      }
    }
  }

  private hasLiveWorker(slot: number): boolean {
    for (const worker of this.workers.values()) {
      if (worker.slot === slot && !worker.retiring && !worker.handle.exited) {
        return true;
      }
    }
    return false;
  }

  private replaceHungWorker(worker: WorkerState, detail: string, heartbeatAgeMs: number): void {
    log.warn(`${worker.workerId} timed out (${detail}), killing`, {
      operation: 'monitor',
      worker_id: worker.workerId,
      slot: worker.slot,
      heartbeat_age_ms: heartbeatAgeMs,
    });
    this.events.emit(SupervisorEventNames.WORKER_TIMEOUT, {
      ...this.workerPayload(worker),
      heartbeatAgeMs,
    });

    this.terminateWorker(worker);
    if (this.recordRestart() && this.state === 'running') {
      this.respawn(worker.slot);
    }
  }

  // ==========================================================================
  // Reload
  // ==========================================================================

  private async performReload(): Promise<void> {
    const launcher = this.launcher;
    if (!launcher) {
      throw new ReloadError('No launcher available');
    }

    this.setState('reloading');
    this.generation++;
    log.info(`Reloading ${this.config.workers} workers (generation ${this.generation})`, {
      operation: 'reload',
      generation: this.generation,
    });
    this.events.emit(SupervisorEventNames.SUPERVISOR_RELOAD_STARTED, { timestamp: new Date() });

    const previous = [...this.workers.values()].filter((worker) => !worker.retiring);
    for (const worker of previous) {
      worker.retiring = true;
    }

    const replacements = Array.from({ length: this.config.workers }, (_, slot) =>
      this.spawnWorker(launcher, slot)
    );
    const ready = await Promise.all(
      replacements.map((worker) => this.waitUntilReady(worker, this.config.bootTimeoutMs))
    );

    if (this.state !== 'reloading') {
      throw new ReloadError(`Reload interrupted (supervisor ${this.state})`);
    }

    if (!ready.every(Boolean)) {
      for (const worker of replacements) {
        this.terminateWorker(worker);
      }
      await Promise.all(replacements.map((worker) => worker.handle.wait()));
      for (const worker of previous) {
        worker.retiring = false;
      }
      this.setState('running');

      const error = new ReloadError(
        `Replacement workers were not ready within ${this.config.bootTimeoutMs}ms; keeping current workers`
      );
      log.error(error.message, { operation: 'reload', error_type: error.errorType });
      throw error;
    }

    for (const worker of previous) {
      if (this.state !== 'reloading') {
        break;
      }
      if (worker.handle.exited) {
        continue;
      }
      this.drainWorker(worker, this.config.gracefulTimeoutMs);
      await this.waitForExit(worker, this.config.gracefulTimeoutMs);
    }

    if (this.state !== 'reloading') {
      throw new ReloadError(`Reload interrupted (supervisor ${this.state})`);
    }
    this.setState('running');
    log.info('Reload complete', { operation: 'reload', generation: this.generation });
    this.events.emit(SupervisorEventNames.SUPERVISOR_RELOAD_COMPLETED, { timestamp: new Date() });
  }

  // ==========================================================================
  // Shutdown
  // ==========================================================================

  private fail(error: PreforkError): void {
    if (this.fatalError) {
      return;
    }
    this.fatalError = error;
    log.fatal(error.message, { operation: 'supervise', error_type: error.errorType });
    this.events.emit(SupervisorEventNames.SUPERVISOR_FATAL, { error, timestamp: new Date() });

    this.shutdown(0).catch((shutdownError: unknown) => {
      log.error(`Shutdown after fatal error failed: ${errorMessage(shutdownError)}`, {
        operation: 'shutdown',
        error_message: errorMessage(shutdownError),
      });
    });
  }

  private async abortStart(error: unknown): Promise<void> {
    if (!this.fatalError) {
      this.fatalError = error instanceof Error ? error : new Error(String(error));
    }
    log.error(`Startup failed: ${errorMessage(error)}`, {
      operation: 'start',
      error_message: errorMessage(error),
    });
    await this.shutdown(0);
  }

  private async performShutdown(graceMs: number): Promise<void> {
    this.setState('stopping');
    this.stopMonitor();

    const workers = [...this.workers.values()];
    log.info(`Shutting down ${workers.length} workers (grace ${graceMs}ms)`, {
      operation: 'shutdown',
      grace_ms: graceMs,
      workers: workers.length,
    });
    this.events.emit(SupervisorEventNames.SUPERVISOR_SHUTDOWN_STARTED, {
      graceMs,
      timestamp: new Date(),
    });

    for (const worker of workers) {
      this.drainWorker(worker, graceMs);
    }

    const grace = timeout(graceMs);
    const allExited = Promise.all(workers.map((worker) => worker.handle.wait()));
    const outcome = await Promise.race([allExited, grace.expired]);
    grace.cancel();

    if (outcome === 'timeout') {
      const stragglers = workers.filter((worker) => !worker.handle.exited);
      if (stragglers.length > 0) {
        log.warn(`Grace period elapsed, terminating ${stragglers.length} workers`, {
          operation: 'shutdown',
          workers: stragglers.length,
        });
      }
      for (const worker of stragglers) {
        this.terminateWorker(worker);
      }
    }
    await allExited;

    // A bind still in flight settles before the listener can be closed
    if (this.binding) {
      const [bound] = await Promise.allSettled([this.binding]);
      if (bound.status === 'fulfilled') {
        this.listener = bound.value;
      }
    }
    if (this.listener) {
      await this.listener.close();
    }

    this.setState(this.fatalError ? 'failed' : 'stopped');
    log.info('Supervisor stopped', { operation: 'shutdown' });
    this.events.emit(SupervisorEventNames.SUPERVISOR_STOPPED, { timestamp: new Date() });
    this.resolveStopped?.();
  }

  private setState(state: SupervisorState): void {
    if (this.state !== state) {
      log.debug(`State ${this.state} -> ${state}`, { operation: 'state', from: this.state, to: state });
      this.state = state;
    }
  }
}
