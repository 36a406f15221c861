/**
 * Supervisor module.
 */

export { RestartLimiter } from './restart-limiter.js';
export {
  type BindFunction,
  type LauncherFactory,
  Supervisor,
  type SupervisorOptions,
} from './supervisor.js';
export type { SupervisorState, SupervisorStatus, WorkerSnapshot, WorkerState } from './types.js';
