/**
 * Supervisor types.
 */

import type { ListenerAddress } from '../listener/listener.js';
import type { ProcessHandle } from '../process/process-handle.js';
import type { WorkerStatus } from '../worker/types.js';

/**
 * Supervisor lifecycle states.
 *
 * idle -> starting -> running <-> reloading -> stopping -> stopped | failed
 */
export type SupervisorState =
  | 'idle'
  | 'starting'
  | 'running'
  | 'reloading'
  | 'stopping'
  | 'stopped'
  | 'failed';

/**
 * The supervisor's record of one worker. Owned by the supervisor alone;
 * workers report through their ProcessHandle.
 */
export interface WorkerState {
  workerId: string;
  slot: number;
  generation: number;
  handle: ProcessHandle;
  status: WorkerStatus;
  startedAt: number;
  lastHeartbeatAt: number;

  /** Being replaced: its exit does not trigger a restart */
  retiring: boolean;

  /** The supervisor asked this worker to drain */
  drainRequested: boolean;

  /** The supervisor killed this worker */
  terminateRequested: boolean;
}

/**
 * Point-in-time view of one worker.
 */
export interface WorkerSnapshot {
  workerId: string;
  slot: number;
  generation: number;
  pid: number | null;
  status: WorkerStatus;
  retiring: boolean;
  uptimeMs: number;
  heartbeatAgeMs: number;
}

/**
 * Point-in-time view of the supervisor.
 */
export interface SupervisorStatus {
  state: SupervisorState;
  model: string;
  address: ListenerAddress | null;

  /** Configured worker count */
  desiredWorkers: number;

  /** Workers currently ready or busy */
  capacity: number;

  /** Reload generation; 0 until the first reload */
  generation: number;

  /** Restarts counted within the restart-limit window */
  restarts: number;

  workers: WorkerSnapshot[];
}
