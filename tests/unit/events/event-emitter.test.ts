/**
 * Typed event emitter tests.
 */

import { describe, expect, it, vi } from 'vitest';
import { SupervisorEventEmitter, WorkerEventEmitter } from '../../../src/events/event-emitter.js';
import { SupervisorEventNames, WorkerEventNames } from '../../../src/events/event-names.js';

describe('WorkerEventEmitter', () => {
  it('delivers typed payloads to subscribers', () => {
    const emitter = new WorkerEventEmitter();
    const handler = vi.fn();
    emitter.on(WorkerEventNames.REQUEST_COMPLETED, handler);

    const payload = { workerId: 'worker-1', method: 'GET', path: '/', status: 200, durationMs: 3 };
    emitter.emit(WorkerEventNames.REQUEST_COMPLETED, payload);

    expect(handler).toHaveBeenCalledWith(payload);
  });

  it('supports once() and off()', () => {
    const emitter = new WorkerEventEmitter();
    const once = vi.fn();
    const always = vi.fn();
    emitter.once(WorkerEventNames.WORKER_HEARTBEAT, once);
    emitter.on(WorkerEventNames.WORKER_HEARTBEAT, always);

    emitter.emit(WorkerEventNames.WORKER_HEARTBEAT, { workerId: 'worker-1', timestamp: new Date() });
    emitter.emit(WorkerEventNames.WORKER_HEARTBEAT, { workerId: 'worker-1', timestamp: new Date() });
    emitter.off(WorkerEventNames.WORKER_HEARTBEAT, always);
    emitter.emit(WorkerEventNames.WORKER_HEARTBEAT, { workerId: 'worker-1', timestamp: new Date() });

    expect(once).toHaveBeenCalledTimes(1);
    expect(always).toHaveBeenCalledTimes(2);
    expect(emitter.listenerCount(WorkerEventNames.WORKER_HEARTBEAT)).toBe(0);
  });
});

describe('SupervisorEventEmitter', () => {
  it('waitForWorkerStatus resolves on the matching worker and status only', async () => {
    const emitter = new SupervisorEventEmitter();
    const waiting = emitter.waitForWorkerStatus('worker-2', 'ready');

    const base = { slot: 0, pid: null, timestamp: new Date() };
    emitter.emit(SupervisorEventNames.WORKER_STATUS, {
      ...base,
      workerId: 'worker-1',
      status: 'ready',
      previous: 'starting',
    });
    emitter.emit(SupervisorEventNames.WORKER_STATUS, {
      ...base,
      workerId: 'worker-2',
      status: 'busy',
      previous: 'starting',
    });
    emitter.emit(SupervisorEventNames.WORKER_STATUS, {
      ...base,
      workerId: 'worker-2',
      status: 'ready',
      previous: 'busy',
    });

    const payload = await waiting;
    expect(payload.workerId).toBe('worker-2');
    expect(payload.previous).toBe('busy');
    expect(emitter.listenerCount(SupervisorEventNames.WORKER_STATUS)).toBe(0);
  });
});

describe('event names', () => {
  it('uses dotted names', () => {
    expect(WorkerEventNames.REQUEST_PARSE_ERROR).toBe('request.parse_error');
    expect(SupervisorEventNames.SUPERVISOR_RELOAD_COMPLETED).toBe('supervisor.reload.completed');
    expect(SupervisorEventNames.WORKER_TIMEOUT).toBe('worker.timeout');
  });
});
