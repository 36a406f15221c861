/**
 * Events module.
 */

export {
  type RequestCompletedPayload,
  type RequestFailedPayload,
  type RequestParseErrorPayload,
  type SupervisedWorkerExitPayload,
  type SupervisedWorkerPayload,
  type SupervisedWorkerStatusPayload,
  type SupervisedWorkerTimeoutPayload,
  SupervisorEventEmitter,
  type SupervisorEventMap,
  type SupervisorFatalPayload,
  type SupervisorLifecyclePayload,
  type SupervisorShutdownPayload,
  type SupervisorStartedPayload,
  WorkerEventEmitter,
  type WorkerEventMap,
  type WorkerHeartbeatPayload,
  type WorkerStatusPayload,
} from './event-emitter.js';
export {
  type SupervisorEventName,
  SupervisorEventNames,
  type WorkerEventName,
  WorkerEventNames,
} from './event-names.js';
