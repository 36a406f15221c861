/**
 * Listener - owns the bound TCP socket.
 *
 * Exactly one Listener owns the port. Workers accept from it through
 * accept(); close() cancels every pending accept() and releases the port.
 *
 * @example
 * ```typescript
 * const listener = await Listener.bind('0.0.0.0', 8080);
 * const socket = await listener.accept();
 * if (socket === null) {
 *   // listener closed
 * }
 * await listener.close();
 * ```
 */

import net, { type Socket } from 'node:net';
import { createLogger, errorMessage } from '../logging/index.js';
import { BindError } from '../types/errors.js';
import { ConnectionQueue, type ConnectionSource } from './connection-queue.js';

const log = createLogger({ component: 'listener' });

/**
 * Options for Listener.bind().
 */
export interface ListenerOptions {
  /** Listen backlog (default: 2048) */
  backlog?: number;

  /**
   * Accepted connections held for workers before new ones are refused
   * (default: the listen backlog)
   */
  maxPending?: number;

  /**
   * Keep accepted sockets unread until a consumer takes them.
   * Required when sockets are handed to another process.
   */
  pauseOnConnect?: boolean;
}

/**
 * Address the listener is bound to.
 */
export interface ListenerAddress {
  host: string;
  port: number;
  family: string;
}

export class Listener implements ConnectionSource {
  private readonly queue: ConnectionQueue;
  private readonly boundAddress: ListenerAddress;
  private closing: Promise<void> | null = null;
  private refused = 0;

  private constructor(
    private readonly server: net.Server,
    maxPending: number
  ) {
    this.queue = new ConnectionQueue(maxPending);
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Listener requires a TCP server address');
    }
    this.boundAddress = {
      host: address.address,
      port: address.port,
      family: address.family,
    };

    server.on('connection', (socket) => {
      if (this.queue.push(socket)) {
        return;
      }
      if (!this.queue.isClosed) {
        this.refused++;
        log.warn('Accept queue full, refusing connection', {
          operation: 'accept',
          pending: this.queue.pendingCount,
          refused: this.refused,
        });
      }
      socket.destroy();
    });
    server.on('error', (error) => {
      log.error(`Listener error: ${error.message}`, {
        operation: 'accept',
        error_message: error.message,
      });
    });
  }

  /**
   * Bind a new listening socket.
   *
   * @throws BindError when the address is in use or not permitted
   */
  static bind(host: string, port: number, options: ListenerOptions = {}): Promise<Listener> {
    return new Promise((resolve, reject) => {
      const backlog = options.backlog ?? 2048;
      const server = net.createServer({ pauseOnConnect: options.pauseOnConnect ?? false });

      const onError = (error: NodeJS.ErrnoException): void => {
        server.off('listening', onListening);
        const bindError = BindError.fromSystemError(error, host, port);
        log.error(bindError.message, {
          operation: 'bind',
          host,
          port,
          code: bindError.code,
        });
        reject(bindError);
      };

      const onListening = (): void => {
        server.off('error', onError);
        const listener = new Listener(server, options.maxPending ?? backlog);
        log.info(`Listening at http://${formatHost(listener.address.host)}:${listener.address.port}`, {
          operation: 'bind',
          host: listener.address.host,
          port: listener.address.port,
        });
        resolve(listener);
      };

      server.once('error', onError);
      server.once('listening', onListening);
      server.listen({ host, port, backlog });
    });
  }

  get address(): ListenerAddress {
    return this.boundAddress;
  }

  get isClosed(): boolean {
    return this.closing !== null;
  }

  /**
   * Connections accepted by the kernel but not yet taken by a worker.
   */
  get pendingCount(): number {
    return this.queue.pendingCount;
  }

  /**
   * Connections refused because the accept queue was full.
   */
  get refusedCount(): number {
    return this.refused;
  }

  accept(signal?: AbortSignal): Promise<Socket | null> {
    return this.queue.accept(signal);
  }

  /**
   * Stop listening and release the port.
   *
   * Pending accept() calls resolve with null; connections that were never
   * accepted are dropped.
   */
  close(): Promise<void> {
    if (this.closing) {
      return this.closing;
    }

    const dropped = this.queue.close();
    for (const socket of dropped) {
      socket.destroy();
    }

    // Sockets sent to worker processes stay counted by net.Server, so its
    // close callback may never fire. The port is free once the handle closes.
    this.server.close((error) => {
      if (error) {
        log.debug(`Listener close reported: ${errorMessage(error)}`, { operation: 'close' });
      }
    });

    this.closing = new Promise<void>((resolve) => {
      setImmediate(() => {
        log.info('Listener closed', {
          operation: 'close',
          port: this.boundAddress.port,
          dropped_connections: dropped.length,
        });
        resolve();
      });
    });
    return this.closing;
  }
}

function formatHost(host: string): string {
  return host.includes(':') ? `[${host}]` : host;
}
