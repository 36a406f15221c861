/**
 * Process module types.
 */

import type { ProcessHandle } from './process-handle.js';

/**
 * Why a worker execution context ended, as seen by the supervisor.
 *
 * - drained: finished a requested drain
 * - recycled: drained itself after its request budget
 * - crashed: exited abnormally (non-zero code, uncaught error, boot failure)
 * - terminated: killed through ProcessHandle.terminate()
 */
export type ExitReason = 'drained' | 'recycled' | 'crashed' | 'terminated';

/**
 * Exit information for a worker execution context.
 */
export interface WorkerExitInfo {
  /** Exit code, when the context exited on its own */
  code: number | null;

  /** Signal name, when the context was killed */
  signal: string | null;

  reason: ExitReason;

  /** Error detail for crashes */
  error?: string;
}

/**
 * Spawns worker execution contexts.
 *
 * Implementations decide the execution model (async task, child process);
 * the supervisor only sees ProcessHandle.
 */
export interface WorkerLauncher {
  /** Execution model name, for logs and status */
  readonly model: string;

  /**
   * Start a new worker.
   *
   * The handle reports 'starting' immediately and 'ready' once the worker
   * accepts connections.
   */
  spawn(workerId: string): ProcessHandle;
}
