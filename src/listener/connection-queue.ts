/**
 * Accept queue shared by every consumer of one connection source.
 *
 * Connections that arrive while nobody is waiting are held in a backlog;
 * accept() callers that arrive while the backlog is empty wait in FIFO
 * order, so the first ready consumer receives the next connection.
 * The backlog holds at most maxPending connections.
 */

import type { Socket } from 'node:net';
import { createLogger } from '../logging/index.js';

const log = createLogger({ component: 'accept-queue' });

/**
 * Anything a Worker can accept connections from.
 */
export interface ConnectionSource {
  /**
   * Wait for the next connection.
   *
   * Resolves with null when the source is closed or the signal aborts;
   * cancellation is never reported as an error.
   */
  accept(signal?: AbortSignal): Promise<Socket | null>;
}

interface Waiter {
  resolve: (socket: Socket | null) => void;
  signal: AbortSignal | undefined;
  onAbort: () => void;
}

export class ConnectionQueue implements ConnectionSource {
  private readonly backlog: Socket[] = [];
  private readonly backlogListeners = new Map<Socket, () => void>();
  private readonly waiters: Waiter[] = [];
  private closed = false;

  constructor(private readonly maxPending: number = Number.POSITIVE_INFINITY) {}

  /**
   * Whether close() has been called.
   */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Connections waiting for a consumer.
   */
  get pendingCount(): number {
    return this.backlog.length;
  }

  /**
   * Consumers waiting for a connection.
   */
  get waitingCount(): number {
    return this.waiters.length;
  }

  /**
   * Whether a connection offered now would be refused for lack of room.
   */
  get isFull(): boolean {
    return this.waiters.length === 0 && this.backlog.length >= this.maxPending;
  }

  /**
   * Offer a new connection. Returns false (and leaves the socket alone)
   * when the queue is closed or the backlog is full.
   */
  push(socket: Socket): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      this.release(waiter);
      waiter.resolve(socket);
      return true;
    }

    if (this.backlog.length >= this.maxPending) {
      return false;
    }

    this.backlog.push(socket);
    const onEnd = (): void => {
      this.detach(socket);
      const index = this.backlog.indexOf(socket);
      if (index !== -1) {
        this.backlog.splice(index, 1);
        log.trace('Queued connection closed before accept', {
          pending: this.backlog.length,
        });
      }
    };
    this.backlogListeners.set(socket, onEnd);
    socket.on('close', onEnd);
    socket.on('error', onEnd);
    return true;
  }

  accept(signal?: AbortSignal): Promise<Socket | null> {
    if (this.closed || signal?.aborted) {
      return Promise.resolve(null);
    }

    const queued = this.backlog.shift();
    if (queued) {
      this.detach(queued);
      return Promise.resolve(queued);
    }

    return new Promise<Socket | null>((resolve) => {
      const waiter: Waiter = {
        resolve,
        signal,
        onAbort: () => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          resolve(null);
        },
      };
      signal?.addEventListener('abort', waiter.onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Close the queue.
   *
   * Every pending accept() resolves with null. Connections still in the
   * backlog are returned to the caller, which decides their fate.
   */
  close(): Socket[] {
    if (this.closed) {
      return [];
    }
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      this.release(waiter);
      waiter.resolve(null);
    }

    const leftovers = this.backlog.splice(0);
    for (const socket of leftovers) {
      this.detach(socket);
    }
    return leftovers;
  }

  private detach(socket: Socket): void {
    const onEnd = this.backlogListeners.get(socket);
    if (onEnd) {
      socket.off('close', onEnd);
      socket.off('error', onEnd);
      this.backlogListeners.delete(socket);
    }
  }

  private release(waiter: Waiter): void {
    waiter.signal?.removeEventListener('abort', waiter.onAbort);
  }
}
