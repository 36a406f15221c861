/**
 * ProcessHandle - the supervisor's capability over one worker.
 *
 * Abstracts spawn/signal/wait/terminate so supervision logic does not
 * depend on whether the worker is an async task or a child process.
 * Workers never touch the supervisor's state; they emit events through
 * their handle.
 */

import { EventEmitter } from 'eventemitter3';
import type { WorkerStatus } from '../worker/types.js';
import type { WorkerExitInfo } from './types.js';

/**
 * Events emitted by a process handle.
 */
export interface ProcessHandleEventMap {
  status: WorkerStatus;
  heartbeat: number;
  exit: WorkerExitInfo;
}

export abstract class ProcessHandle extends EventEmitter<ProcessHandleEventMap> {
  private exitRecord: WorkerExitInfo | null = null;
  private readonly exitPromise: Promise<WorkerExitInfo>;
  private resolveExit: ((info: WorkerExitInfo) => void) | null = null;

  constructor(readonly id: string) {
    super();
    this.exitPromise = new Promise<WorkerExitInfo>((resolve) => {
      this.resolveExit = resolve;
    });
  }

  /**
   * OS process id, or null for in-process workers.
   */
  abstract get pid(): number | null;

  /**
   * Ask the worker to stop accepting and finish in-flight requests
   * within graceMs.
   */
  abstract drain(graceMs: number): void;

  /**
   * Stop the worker immediately, aborting in-flight requests.
   */
  abstract terminate(): void;

  /**
   * Whether the worker has exited.
   */
  get exited(): boolean {
    return this.exitRecord !== null;
  }

  /**
   * Exit information once exited.
   */
  get exitInfo(): WorkerExitInfo | null {
    return this.exitRecord;
  }

  /**
   * Resolve once the worker has exited.
   */
  wait(): Promise<WorkerExitInfo> {
    return this.exitPromise;
  }

  /**
   * Record the exit. Only the first call has any effect.
   */
  protected markExited(info: WorkerExitInfo): void {
    if (this.exitRecord) {
      return;
    }
    this.exitRecord = info;
    this.emit('status', 'dead');
    this.emit('exit', info);
    this.resolveExit?.(info);
  }
}
