/**
 * Process module.
 *
 * Worker execution contexts behind the ProcessHandle capability.
 */

export {
  defaultWorkerEntry,
  type ForkLauncherOptions,
  ForkProcessHandle,
  ForkWorkerLauncher,
} from './fork-launcher.js';
export { InlineProcessHandle, InlineWorkerLauncher, type InlineWorkerOptions } from './inline-launcher.js';
export { type AppSource, createLauncher, workerOptionsFromConfig } from './launcher-factory.js';
export { ProcessHandle, type ProcessHandleEventMap } from './process-handle.js';
export type { ExitReason, WorkerExitInfo, WorkerLauncher } from './types.js';
