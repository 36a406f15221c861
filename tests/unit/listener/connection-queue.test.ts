/**
 * ConnectionQueue tests.
 */

import { Socket } from 'node:net';
import { describe, expect, it } from 'vitest';
import { ConnectionQueue } from '../../../src/listener/connection-queue.js';

describe('ConnectionQueue', () => {
  it('hands a backlogged connection to the next accept()', async () => {
    const queue = new ConnectionQueue();
    const socket = new Socket();

    expect(queue.push(socket)).toBe(true);
    expect(queue.pendingCount).toBe(1);

    await expect(queue.accept()).resolves.toBe(socket);
    expect(queue.pendingCount).toBe(0);
  });

  it('serves waiting consumers in FIFO order', async () => {
    const queue = new ConnectionQueue();
    const first = queue.accept();
    const second = queue.accept();
    expect(queue.waitingCount).toBe(2);

    const a = new Socket();
    const b = new Socket();
    queue.push(a);
    queue.push(b);

    await expect(first).resolves.toBe(a);
    await expect(second).resolves.toBe(b);
    expect(queue.waitingCount).toBe(0);
  });

  it('resolves null when the signal aborts', async () => {
    const queue = new ConnectionQueue();
    const controller = new AbortController();
    const pending = queue.accept(controller.signal);

    controller.abort();

    await expect(pending).resolves.toBeNull();
    expect(queue.waitingCount).toBe(0);
  });

  it('resolves null immediately for an aborted signal', async () => {
    const queue = new ConnectionQueue();
    queue.push(new Socket());
    await expect(queue.accept(AbortSignal.abort())).resolves.toBeNull();
    expect(queue.pendingCount).toBe(1);
  });

  it('drops a backlogged connection that closes before accept', () => {
    const queue = new ConnectionQueue();
    const socket = new Socket();
    queue.push(socket);

    socket.emit('close', false);

    expect(queue.pendingCount).toBe(0);
  });

  it('refuses connections beyond maxPending until one is accepted', async () => {
    const queue = new ConnectionQueue(2);
    const [a, b, c] = [new Socket(), new Socket(), new Socket()];

    expect(queue.push(a)).toBe(true);
    expect(queue.push(b)).toBe(true);
    expect(queue.isFull).toBe(true);
    expect(queue.push(c)).toBe(false);
    expect(queue.pendingCount).toBe(2);

    await expect(queue.accept()).resolves.toBe(a);
    expect(queue.isFull).toBe(false);
    expect(queue.push(c)).toBe(true);
  });

  it('hands a connection to a waiting consumer even when maxPending is zero', async () => {
    const queue = new ConnectionQueue(0);
    const pending = queue.accept();
    const socket = new Socket();

    expect(queue.isFull).toBe(false);
    expect(queue.push(socket)).toBe(true);
    await expect(pending).resolves.toBe(socket);
    expect(queue.push(new Socket())).toBe(false);
  });

  it('close() wakes waiters and returns leftovers', async () => {
    const queue = new ConnectionQueue();
    const leftover = new Socket();
    queue.push(leftover);

    const second = new ConnectionQueue();
    const waiting = second.accept();
    expect(second.close()).toEqual([]);
    await expect(waiting).resolves.toBeNull();

    expect(queue.close()).toEqual([leftover]);
    expect(queue.isClosed).toBe(true);
    expect(queue.close()).toEqual([]);
  });

  it('refuses connections once closed', async () => {
    const queue = new ConnectionQueue();
    queue.close();
    expect(queue.push(new Socket())).toBe(false);
    await expect(queue.accept()).resolves.toBeNull();
  });
});
