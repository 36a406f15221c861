/**
 * Worker module types.
 */

import type { Handler } from '../http/handler.js';

/**
 * Worker lifecycle states.
 *
 * State transitions:
 * - starting -> ready <-> busy -> draining -> dead
 * - Any state can transition to 'dead' on termination
 */
export type WorkerStatus = 'starting' | 'ready' | 'busy' | 'draining' | 'dead';

export const WorkerStatuses = {
  STARTING: 'starting',
  READY: 'ready',
  BUSY: 'busy',
  DRAINING: 'draining',
  DEAD: 'dead',
} as const satisfies Record<string, WorkerStatus>;

/**
 * Why a worker's run loop ended.
 *
 * - drained: drain() completed (reload, shutdown)
 * - recycled: request budget exhausted, worker drained itself
 * - closed: the connection source closed underneath the worker
 * - terminated: abort() destroyed every connection
 */
export type WorkerExitReason = 'drained' | 'recycled' | 'closed' | 'terminated';

/**
 * Options for a Worker.
 *
 * All fields except id and handler are optional with sensible defaults.
 */
export interface WorkerOptions {
  /** Worker identifier used in logs and events */
  id: string;

  /** Application handler */
  handler: Handler;

  /** Per-request deadline in milliseconds (default: 30000) */
  requestTimeoutMs?: number;

  /** Idle keep-alive timeout in milliseconds (default: 2000) */
  keepAliveTimeoutMs?: number;

  /** Requests per keep-alive connection; 0 is unbounded (default: 100) */
  maxRequestsPerConnection?: number;

  /** Concurrent connections this worker accepts (default: 1000) */
  workerConnections?: number;

  /** Heartbeat interval in milliseconds (default: 1000) */
  heartbeatIntervalMs?: number;

  /** Requests before the worker recycles itself; 0 disables (default: 0) */
  maxRequests?: number;

  /** Upper bound of random requests added to maxRequests (default: 0) */
  maxRequestsJitter?: number;

  /** Grace period used when the worker recycles itself (default: 30000) */
  gracefulTimeoutMs?: number;

  /** Maximum request header size in bytes (default: 16384) */
  maxHeaderSize?: number;
}

/**
 * Counters reported by a worker.
 */
export interface WorkerStats {
  /** Requests that produced a handler response */
  handled: number;

  /** Requests whose handler threw or rejected */
  failed: number;

  /** Connections rejected by the HTTP parser */
  parseErrors: number;

  /** Requests that exceeded the deadline */
  timeouts: number;

  /** Requests currently executing */
  activeRequests: number;

  /** Open connections */
  activeConnections: number;
}
