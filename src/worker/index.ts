/**
 * Worker module.
 *
 * The Worker serving loop, application loading and the worker-process side
 * of the fork model.
 */

export {
  type AppReference,
  isApplication,
  isHandler,
  loadApplication,
  parseAppReference,
  toHandler,
} from './app-loader.js';
export {
  type ChildMessage,
  type InitMessage,
  type ParentMessage,
  parseChildMessage,
  parseParentMessage,
  type WorkerProcessOptions,
  workerProcessOptionsSchema,
} from './ipc.js';
export type {
  WorkerExitReason,
  WorkerOptions,
  WorkerStats,
  WorkerStatus,
} from './types.js';
export { WorkerStatuses } from './types.js';
export { Worker } from './worker.js';
export {
  type ApplicationLoader,
  type ParentPort,
  processParentPort,
  runWorkerProcess,
} from './worker-process.js';
