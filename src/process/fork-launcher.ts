/**
 * Fork execution model: each worker is a child process.
 *
 * The supervisor's Listener keeps accepting; each handle runs a dispatch
 * loop that takes the next connection whenever its child has spare
 * capacity and transfers the socket over IPC. Idle children therefore
 * compete for connections in FIFO order (first ready wins), and the
 * Listener is never rebound while workers come and go.
 */

import { type ChildProcess, fork } from 'node:child_process';
import type { Socket } from 'node:net';
import { extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { ConnectionSource } from '../listener/connection-queue.js';
import { createLogger, errorMessage, getRootLogger } from '../logging/index.js';
import { type ChildMessage, type ParentMessage, parseChildMessage, type WorkerProcessOptions } from '../worker/ipc.js';
import type { WorkerExitReason, WorkerStatus } from '../worker/types.js';
import { ProcessHandle } from './process-handle.js';
import type { ExitReason, WorkerExitInfo, WorkerLauncher } from './types.js';

const log = createLogger({ component: 'fork-launcher' });

/**
 * Options for ForkWorkerLauncher.
 */
export interface ForkLauncherOptions {
  /** Connection source owned by the supervisor (a Listener bound with pauseOnConnect) */
  source: ConnectionSource;

  /** Application reference loaded by each child, "path/to/module[:export]" */
  app: string;

  /** Directory the application reference resolves against (default: process.cwd()) */
  cwd?: string;

  /** Options forwarded to the Worker in each child */
  worker: WorkerProcessOptions;

  /** Script run by each child (default: the bundled worker entry) */
  entry?: string;

  /** Node options for each child (default: inherited from this process) */
  execArgv?: string[];
}

/**
 * Path of the worker entry next to this module, matching its extension so
 * the same code runs from sources (through tsx) and from dist/.
 */
export function defaultWorkerEntry(): string {
  const extension = extname(fileURLToPath(import.meta.url));
  return fileURLToPath(new URL(`../worker/worker-entry${extension}`, import.meta.url));
}

function toExitReason(reason: WorkerExitReason): ExitReason {
  return reason === 'recycled' ? 'recycled' : 'drained';
}

/**
 * Handle over one worker child process.
 */
export class ForkProcessHandle extends ProcessHandle {
  private status: WorkerStatus = 'starting';
  private outstanding = 0;
  private dispatching = false;
  private reportedExit: WorkerExitReason | null = null;
  private fatalMessage: string | null = null;
  private terminateRequested = false;
  private readonly dispatchAbort = new AbortController();
  private creditWaiter: (() => void) | null = null;

  constructor(
    id: string,
    private readonly child: ChildProcess,
    private readonly source: ConnectionSource,
    private readonly workerConnections: number
  ) {
    super(id);

    child.on('message', (raw) => this.onMessage(raw));
    child.on('error', (error) => {
      log.error(`Worker process ${id} error: ${error.message}`, {
        operation: 'ipc',
        worker_id: id,
        error_message: error.message,
      });
      if (child.pid === undefined) {
        this.onClose(null, null, error.message);
      }
    });
    child.once('close', (code, signal) => this.onClose(code, signal));
  }

  get pid(): number | null {
    return this.child.pid ?? null;
  }

  /**
   * Connections transferred to the child and not yet closed.
   */
  get outstandingConnections(): number {
    return this.outstanding;
  }

  send(message: ParentMessage): void {
    if (this.child.connected) {
      this.child.send(message);
    }
  }

  drain(graceMs: number): void {
    this.stopDispatch();
    this.send({ type: 'drain', graceMs });
  }

  terminate(): void {
    if (this.exited) {
      return;
    }
    this.terminateRequested = true;
    this.stopDispatch();
    this.child.kill('SIGKILL');
  }

  // ==========================================================================
  // IPC
  // ==========================================================================

  private onMessage(raw: unknown): void {
    const message = parseChildMessage(raw);
    if (message === null) {
      log.warn(`Ignoring malformed message from worker ${this.id}`, {
        operation: 'ipc',
        worker_id: this.id,
      });
      return;
    }
    this.handleMessage(message);
  }

  private handleMessage(message: ChildMessage): void {
    switch (message.type) {
      case 'status':
        this.status = message.status;
        if (message.status === 'ready' && !this.dispatching) {
          this.startDispatch();
        }
        if (message.status !== 'dead') {
          this.emit('status', message.status);
        }
        return;

      case 'heartbeat':
        this.emit('heartbeat', message.timestamp);
        return;

      case 'connection-closed':
        this.outstanding = Math.max(0, this.outstanding - 1);
        this.creditWaiter?.();
        return;

      case 'exit':
        this.reportedExit = message.reason;
        return;

      case 'fatal':
        this.fatalMessage = message.message;
        return;
    }
  }

  private onClose(code: number | null, signal: NodeJS.Signals | null, detail?: string): void {
    if (this.exited) {
      return;
    }
    this.stopDispatch();

    let reason: ExitReason;
    if (this.terminateRequested) {
      reason = 'terminated';
    } else if (code === 0 && this.reportedExit !== null) {
      reason = toExitReason(this.reportedExit);
    } else {
      reason = 'crashed';
    }

    const info: WorkerExitInfo = { code, signal, reason };
    const error = detail ?? this.fatalMessage;
    if (reason === 'crashed' && error) {
      info.error = error;
    }

    log.debug(`Worker process ${this.id} closed`, {
      operation: 'exit',
      worker_id: this.id,
      code,
      signal,
      reason,
      last_status: this.status,
    });
    this.markExited(info);
  }

  // ==========================================================================
  // Connection dispatch
  // ==========================================================================

  private startDispatch(): void {
    this.dispatching = true;
    this.dispatchLoop().catch((error: unknown) => {
      log.error(`Dispatch to worker ${this.id} failed: ${errorMessage(error)}`, {
        operation: 'dispatch',
        worker_id: this.id,
        error_message: errorMessage(error),
      });
    });
  }

  private stopDispatch(): void {
    this.dispatchAbort.abort();
    this.creditWaiter?.();
  }

  private async dispatchLoop(): Promise<void> {
    const signal = this.dispatchAbort.signal;
    while (!signal.aborted) {
      if (this.outstanding >= this.workerConnections) {
        await this.waitForCredit();
        continue;
      }

      const socket = await this.source.accept(signal);
      if (socket === null) {
        return;
      }
      this.transfer(socket);
    }
  }

  private waitForCredit(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.creditWaiter = () => {
        this.creditWaiter = null;
        resolve();
      };
    });
  }

  private transfer(socket: Socket): void {
    this.outstanding++;
    this.child.send({ type: 'connection' }, socket, (error) => {
      if (error) {
        this.outstanding = Math.max(0, this.outstanding - 1);
        log.warn(`Could not hand connection to worker ${this.id}: ${error.message}`, {
          operation: 'dispatch',
          worker_id: this.id,
        });
        socket.destroy();
      }
    });
  }
}

/**
 * Launches each worker as a forked child process.
 */
export class ForkWorkerLauncher implements WorkerLauncher {
  readonly model = 'process';
  private readonly entry: string;

  constructor(private readonly options: ForkLauncherOptions) {
    this.entry = options.entry ?? defaultWorkerEntry();
  }

  spawn(workerId: string): ProcessHandle {
    const child = fork(this.entry, [], {
      execArgv: this.options.execArgv ?? process.execArgv,
      // Children log at the supervisor's current level
      env: { ...process.env, PREFORK_WORKER_ID: workerId, PREFORK_LOG_LEVEL: getRootLogger().level },
      serialization: 'json',
    });

    const handle = new ForkProcessHandle(
      workerId,
      child,
      this.options.source,
      this.options.worker.workerConnections ?? 1_000
    );
    handle.send({
      type: 'init',
      workerId,
      app: this.options.app,
      cwd: this.options.cwd ?? process.cwd(),
      options: this.options.worker,
    });

    log.debug(`Forked worker process ${workerId}`, {
      operation: 'spawn',
      worker_id: workerId,
      pid: child.pid,
    });
    return handle;
  }
}
