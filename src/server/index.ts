/**
 * Server module.
 *
 * Provides the PreforkServer facade, the control-command and signal
 * mapping, and the ShutdownController for coordinating shutdown.
 */

export {
  type CommandTarget,
  type ControlCommand,
  ControlCommands,
  type ControlSignal,
  installSignalHandlers,
  SIGNAL_COMMANDS,
  type SignalSource,
} from './control.js';
export { PreforkServer } from './prefork-server.js';
export { ShutdownController, type ShutdownHandler, type ShutdownMode } from './shutdown-controller.js';
export type {
  HealthCheckResult,
  PreforkServerOptions,
  ServerState,
  ServerStatus,
} from './types.js';
export { ServerStates } from './types.js';
