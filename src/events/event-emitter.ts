/**
 * Typed event emitters for workers and the supervisor.
 */

import { EventEmitter } from 'eventemitter3';
import type { ListenerAddress } from '../listener/listener.js';
import type { WorkerExitInfo } from '../process/types.js';
import type { WorkerStatus } from '../worker/types.js';
import { SupervisorEventNames } from './event-names.js';

/**
 * Event payload types
 */
export interface WorkerStatusPayload {
  workerId: string;
  status: WorkerStatus;
  previous: WorkerStatus;
  timestamp: Date;
}

export interface WorkerHeartbeatPayload {
  workerId: string;
  timestamp: Date;
}

export interface RequestCompletedPayload {
  workerId: string;
  method: string;
  path: string;
  status: number;
  durationMs: number;
}

export interface RequestFailedPayload {
  workerId: string;
  method: string;
  path: string;
  error: Error;
  durationMs: number;
}

export interface RequestParseErrorPayload {
  workerId: string;
  error: Error;
  statusCode: number;
}

/**
 * Event map for a single Worker
 */
export interface WorkerEventMap {
  'worker.status': WorkerStatusPayload;
  'worker.heartbeat': WorkerHeartbeatPayload;
  'request.completed': RequestCompletedPayload;
  'request.failed': RequestFailedPayload;
  'request.parse_error': RequestParseErrorPayload;
}

export class WorkerEventEmitter extends EventEmitter<WorkerEventMap> {}

export interface SupervisorStartedPayload {
  address: ListenerAddress;
  workers: number;
  model: string;
  timestamp: Date;
}

export interface SupervisorLifecyclePayload {
  timestamp: Date;
  message?: string;
}

export interface SupervisorShutdownPayload {
  graceMs: number;
  timestamp: Date;
}

export interface SupervisorFatalPayload {
  error: Error;
  timestamp: Date;
}

export interface SupervisedWorkerPayload {
  workerId: string;
  slot: number;
  pid: number | null;
  timestamp: Date;
}

export interface SupervisedWorkerStatusPayload extends SupervisedWorkerPayload {
  status: WorkerStatus;
  previous: WorkerStatus;
}

export interface SupervisedWorkerExitPayload extends SupervisedWorkerPayload {
  exit: WorkerExitInfo;
  /** False when the exit was a crash or an unrequested termination */
  expected: boolean;
}

export interface SupervisedWorkerTimeoutPayload extends SupervisedWorkerPayload {
  heartbeatAgeMs: number;
}

/**
 * Event map for the Supervisor
 */
export interface SupervisorEventMap {
  'supervisor.started': SupervisorStartedPayload;
  'supervisor.reload.started': SupervisorLifecyclePayload;
  'supervisor.reload.completed': SupervisorLifecyclePayload;
  'supervisor.shutdown.started': SupervisorShutdownPayload;
  'supervisor.stopped': SupervisorLifecyclePayload;
  'supervisor.fatal': SupervisorFatalPayload;
  'worker.spawned': SupervisedWorkerPayload;
  'worker.status': SupervisedWorkerStatusPayload;
  'worker.exited': SupervisedWorkerExitPayload;
  'worker.timeout': SupervisedWorkerTimeoutPayload;
}

/**
 * Type-safe event emitter for supervisor events
 */
export class SupervisorEventEmitter extends EventEmitter<SupervisorEventMap> {
  /**
   * Resolve when a supervised worker reaches the given status.
   */
  waitForWorkerStatus(
    workerId: string,
    status: WorkerStatus
  ): Promise<SupervisedWorkerStatusPayload> {
    return new Promise((resolve) => {
      const onStatus = (payload: SupervisedWorkerStatusPayload): void => {
        if (payload.workerId === workerId && payload.status === status) {
          this.off(SupervisorEventNames.WORKER_STATUS, onStatus);
          resolve(payload);
        }
      };
      this.on(SupervisorEventNames.WORKER_STATUS, onStatus);
    });
  }
}
