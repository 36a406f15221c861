/**
 * Standard event names for the serving core.
 */

/**
 * Event names emitted by a Worker
 */
export const WorkerEventNames = {
  /** Emitted on every worker status transition */
  WORKER_STATUS: 'worker.status',

  /** Emitted every heartbeat interval while the worker is alive */
  WORKER_HEARTBEAT: 'worker.heartbeat',

  /** Emitted when a handler produced a response */
  REQUEST_COMPLETED: 'request.completed',

  /** Emitted when a handler threw, rejected or timed out */
  REQUEST_FAILED: 'request.failed',

  /** Emitted when the HTTP parser rejected a connection */
  REQUEST_PARSE_ERROR: 'request.parse_error',
} as const;

/**
 * Event names emitted by the Supervisor
 */
export const SupervisorEventNames = {
  /** Emitted once all initial workers are ready */
  SUPERVISOR_STARTED: 'supervisor.started',

  /** Emitted when a rolling reload begins */
  SUPERVISOR_RELOAD_STARTED: 'supervisor.reload.started',

  /** Emitted when a rolling reload has replaced every worker */
  SUPERVISOR_RELOAD_COMPLETED: 'supervisor.reload.completed',

  /** Emitted when shutdown begins */
  SUPERVISOR_SHUTDOWN_STARTED: 'supervisor.shutdown.started',

  /** Emitted when every worker is dead and the listener is closed */
  SUPERVISOR_STOPPED: 'supervisor.stopped',

  /** Emitted on an unrecoverable condition (restart storm) */
  SUPERVISOR_FATAL: 'supervisor.fatal',

  /** Emitted when a worker is spawned into a slot */
  WORKER_SPAWNED: 'worker.spawned',

  /** Emitted when a supervised worker changes status */
  WORKER_STATUS: 'worker.status',

  /** Emitted when a supervised worker exits */
  WORKER_EXITED: 'worker.exited',

  /** Emitted when a worker misses its heartbeat deadline */
  WORKER_TIMEOUT: 'worker.timeout',
} as const;

/**
 * Type representing worker event names
 */
export type WorkerEventName = (typeof WorkerEventNames)[keyof typeof WorkerEventNames];

/**
 * Type representing supervisor event names
 */
export type SupervisorEventName = (typeof SupervisorEventNames)[keyof typeof SupervisorEventNames];
