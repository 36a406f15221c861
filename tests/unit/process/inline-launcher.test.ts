/**
 * Inline execution model tests.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Handler } from '../../../src/http/handler.js';
import { text } from '../../../src/http/responses.js';
import { Listener } from '../../../src/listener/listener.js';
import {
  InlineProcessHandle,
  InlineWorkerLauncher,
  type InlineWorkerOptions,
} from '../../../src/process/inline-launcher.js';
import type { ProcessHandle } from '../../../src/process/process-handle.js';
import type { WorkerStatus } from '../../../src/worker/types.js';
import { Worker } from '../../../src/worker/worker.js';
import { delay, request, waitFor } from '../../helpers/http.js';

const hello: Handler = () => text({ status: 200, body: 'inline' });

describe('InlineWorkerLauncher', () => {
  let listener: Listener;
  const handles: ProcessHandle[] = [];

  beforeEach(async () => {
    listener = await Listener.bind('127.0.0.1', 0);
  });

  afterEach(async () => {
    for (const handle of handles.splice(0)) {
      handle.terminate();
      await handle.wait();
    }
    await listener.close();
  });

  function spawn(handler: Handler = hello, options: InlineWorkerOptions = {}): ProcessHandle {
    const handle = new InlineWorkerLauncher(listener, handler, options).spawn('worker-1');
    handles.push(handle);
    return handle;
  }

  it('reports the inline model', () => {
    expect(new InlineWorkerLauncher(listener, hello).model).toBe('inline');
  });

  it('emits ready to listeners attached right after spawn', async () => {
    const handle = spawn();
    const statuses: WorkerStatus[] = [];
    handle.on('status', (status) => statuses.push(status));

    await waitFor(() => statuses.includes('ready'));
    expect(statuses[0]).toBe('ready');
    expect(handle.pid).toBeNull();
  });

  it('forwards heartbeats as epoch milliseconds', async () => {
    const handle = spawn(hello, { heartbeatIntervalMs: 10 });
    const beats: number[] = [];
    handle.on('heartbeat', (timestamp) => beats.push(timestamp));
    const before = Date.now();

    await waitFor(() => beats.length >= 2);
    expect(beats[0]).toBeGreaterThanOrEqual(before);
  });

  it('serves requests from the shared listener', async () => {
    spawn();
    const response = await request(listener.address.port, '/');
    expect(response.body).toBe('inline');
  });

  it('maps a drain to a drained exit', async () => {
    const handle = spawn();
    await delay(5);

    handle.drain(100);

    await expect(handle.wait()).resolves.toEqual({ code: 0, signal: null, reason: 'drained' });
  });

  it('maps a closed listener to a drained exit', async () => {
    const handle = spawn();
    await delay(5);

    await listener.close();

    await expect(handle.wait()).resolves.toMatchObject({ reason: 'drained' });
  });

  it('maps terminate to a terminated exit', async () => {
    const handle = spawn();
    await delay(5);

    handle.terminate();

    await expect(handle.wait()).resolves.toEqual({ code: 0, signal: null, reason: 'terminated' });
  });

  it('maps a recycle to a recycled exit', async () => {
    const handle = spawn(hello, { maxRequests: 1 });
    await request(listener.address.port, '/');
    await expect(handle.wait()).resolves.toMatchObject({ reason: 'recycled' });
  });

  it('reports a crash when the worker loop rejects', async () => {
    const worker = new Worker({ id: 'worker-9', handler: hello });
    const first = new InlineProcessHandle(worker, listener);
    const second = new InlineProcessHandle(worker, listener);
    handles.push(first);

    await expect(second.wait()).resolves.toEqual({
      code: 1,
      signal: null,
      reason: 'crashed',
      error: 'Worker worker-9 is already running',
    });
    expect(first.exited).toBe(false);
  });

  it('emits dead once on exit', async () => {
    const handle = spawn();
    const statuses: WorkerStatus[] = [];
    handle.on('status', (status) => statuses.push(status));
    await waitFor(() => statuses.includes('ready'));

    handle.drain(100);
    await handle.wait();

    expect(statuses.filter((status) => status === 'dead')).toHaveLength(1);
    expect(statuses.slice(-2)).toEqual(['draining', 'dead']);
  });
});
