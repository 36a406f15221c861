/**
 * Server configuration types.
 */

/**
 * How workers are executed.
 *
 * - process: each worker is a child process (fault isolation)
 * - inline: each worker is an async task inside the supervisor's process
 */
export type WorkerModel = 'process' | 'inline';

/**
 * Restart-rate ceiling for crashed or hung workers.
 */
export interface RestartLimit {
  /** Maximum automatic restarts tolerated inside the window */
  readonly maxRestarts: number;

  /** Rolling window length in milliseconds */
  readonly windowMs: number;
}

/**
 * Server configuration. Immutable once loaded.
 */
export interface ServerConfig {
  /** Interface to bind (default: "0.0.0.0") */
  readonly host: string;

  /** TCP port to bind (default: 8080; 0 picks an ephemeral port) */
  readonly port: number;

  /** Number of workers to keep running (default: 1) */
  readonly workers: number;

  /** Worker execution model (default: "process") */
  readonly workerModel: WorkerModel;

  /** Per-request handler deadline in milliseconds (default: 30000) */
  readonly requestTimeoutMs: number;

  /** Grace period for draining workers in milliseconds (default: 30000) */
  readonly gracefulTimeoutMs: number;

  /** Heartbeat age after which a worker is considered hung (default: 30000) */
  readonly timeoutMs: number;

  /** Interval between worker heartbeats (default: 1000) */
  readonly heartbeatIntervalMs: number;

  /** Interval between supervisor monitor cycles (default: 1000) */
  readonly monitorIntervalMs: number;

  /** Time a new worker has to report ready (default: 30000) */
  readonly bootTimeoutMs: number;

  /** Idle keep-alive timeout in milliseconds (default: 2000) */
  readonly keepAliveTimeoutMs: number;

  /** Requests served on one keep-alive connection; 0 is unbounded (default: 100) */
  readonly maxRequestsPerConnection: number;

  /** Concurrent connections per worker (default: 1000) */
  readonly workerConnections: number;

  /** Requests a worker serves before it is recycled; 0 disables (default: 0) */
  readonly maxRequests: number;

  /** Random extra requests added to maxRequests per worker (default: 0) */
  readonly maxRequestsJitter: number;

  /** Maximum size of request headers in bytes (default: 16384) */
  readonly maxHeaderSize: number;

  /** Listen backlog (default: 2048) */
  readonly backlog: number;

  /** Restart-rate ceiling (default: 10 restarts per 60s) */
  readonly restartLimit: RestartLimit;
}

/**
 * Partial configuration accepted by loadServerConfig().
 *
 * `bind` takes "host:port" and is applied before `host` and `port`.
 */
export type ServerConfigOverrides = {
  -readonly [K in Exclude<keyof ServerConfig, 'restartLimit'>]?: ServerConfig[K];
} & {
  bind?: string;
  restartLimit?: Partial<RestartLimit>;
};
