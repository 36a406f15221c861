/**
 * Server module types.
 *
 * Defines types for PreforkServer lifecycle and status.
 */

import type { SupervisorEventEmitter } from '../events/event-emitter.js';
import type { BindFunction, LauncherFactory } from '../supervisor/supervisor.js';
import type { SupervisorStatus } from '../supervisor/types.js';

/**
 * Server lifecycle states.
 *
 * State transitions:
 * - initialized -> starting -> running -> shutting_down -> stopped
 * - Any state can transition to 'error' on fatal failures
 */
export type ServerState =
  | 'initialized'
  | 'starting'
  | 'running'
  | 'shutting_down'
  | 'stopped'
  | 'error';

export const ServerStates = {
  INITIALIZED: 'initialized',
  STARTING: 'starting',
  RUNNING: 'running',
  SHUTTING_DOWN: 'shutting_down',
  STOPPED: 'stopped',
  ERROR: 'error',
} as const satisfies Record<string, ServerState>;

/**
 * Optional collaborators for PreforkServer.
 */
export interface PreforkServerOptions {
  /** Override launcher selection (default: createLauncher for config.workerModel) */
  launcherFactory?: LauncherFactory;

  /** Override how the Listener is bound */
  bind?: BindFunction;

  /** Emitter for supervisor lifecycle events */
  emitter?: SupervisorEventEmitter;
}

/**
 * Health check result.
 */
export interface HealthCheckResult {
  /** Whether the server is serving */
  healthy: boolean;

  /** Optional status details when healthy */
  status?: ServerStatus;

  /** Error message when unhealthy */
  error?: string;
}

/**
 * Server status information.
 */
export interface ServerStatus {
  /** Current server state */
  state: ServerState;

  /** Whether the server is accepting requests */
  running: boolean;

  /** Server uptime in milliseconds */
  uptimeMs: number;

  /** Supervisor and worker details */
  supervisor: SupervisorStatus;
}
