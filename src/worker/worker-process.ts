/**
 * Worker process side of the fork model.
 *
 * Waits for the supervisor's init message, loads the application, then
 * serves the connections the supervisor transfers over IPC until told to
 * drain or the supervisor goes away.
 */

import { Socket } from 'node:net';
import { WorkerEventNames } from '../events/event-names.js';
import type { Handler } from '../http/handler.js';
import { ConnectionQueue } from '../listener/connection-queue.js';
import { createLogger, errorMessage } from '../logging/index.js';
import { loadApplication } from './app-loader.js';
import { type ChildMessage, type InitMessage, parseParentMessage } from './ipc.js';
import { Worker } from './worker.js';

const log = createLogger({ component: 'worker-process' });

/**
 * The worker process's view of its IPC channel.
 */
export interface ParentPort {
  send(message: ChildMessage): void;
  onMessage(listener: (message: unknown, handle: unknown) => void): void;
  onDisconnect(listener: () => void): void;
}

export type ApplicationLoader = (reference: string, cwd?: string) => Promise<Handler>;

/**
 * ParentPort over this process's IPC channel.
 */
export function processParentPort(): ParentPort {
  return {
    send: (message) => {
      if (process.connected && process.send) {
        process.send(message);
      }
    },
    onMessage: (listener) => {
      process.on('message', listener);
    },
    onDisconnect: (listener) => {
      process.on('disconnect', listener);
    },
  };
}

/**
 * Run the worker process protocol.
 *
 * @returns The process exit code: 0 after a clean worker exit, 1 when the
 *   application could not be loaded
 */
export function runWorkerProcess(
  port: ParentPort,
  load: ApplicationLoader = loadApplication
): Promise<number> {
  return new Promise<number>((resolveExit) => {
    const queue = new ConnectionQueue();
    let worker: Worker | null = null;
    let initialized = false;
    let done = false;

    const finish = (code: number, message: ChildMessage): void => {
      if (done) {
        return;
      }
      done = true;
      port.send(message);
      resolveExit(code);
    };

    const start = async (init: InitMessage): Promise<void> => {
      const handler = await load(init.app, init.cwd);
      if (done) {
        return;
      }

      const current = new Worker({ ...init.options, id: init.workerId, handler });
      worker = current;
      current.events.on(WorkerEventNames.WORKER_STATUS, ({ status }) => {
        port.send({ type: 'status', status });
      });
      current.events.on(WorkerEventNames.WORKER_HEARTBEAT, ({ timestamp }) => {
        port.send({ type: 'heartbeat', timestamp: timestamp.getTime() });
      });

      const reason = await current.run(queue);
      finish(0, { type: 'exit', reason });
    };

    const receive = (socket: Socket): void => {
      socket.once('close', () => port.send({ type: 'connection-closed' }));
      if (queue.push(socket)) {
        return;
      }
      // Late delivery after drain began
      if (worker) {
        worker.adopt(socket);
      } else {
        socket.destroy();
      }
    };

    const drain = (graceMs: number): void => {
      const current = worker;
      if (current) {
        void current.drain(graceMs);
      }
      const leftovers = queue.close();
      for (const socket of leftovers) {
        if (current) {
          current.adopt(socket);
        } else {
          socket.destroy();
        }
      }
      if (!current) {
        finish(0, { type: 'exit', reason: 'drained' });
      }
    };

    port.onMessage((raw, handle) => {
      const message = parseParentMessage(raw);
      if (message === null) {
        log.warn('Ignoring malformed supervisor message', { operation: 'ipc' });
        return;
      }

      switch (message.type) {
        case 'init':
          if (initialized) {
            log.warn('Ignoring repeated init message', { operation: 'ipc' });
            return;
          }
          initialized = true;
          start(message).catch((error: unknown) => {
            log.error(`Worker failed to start: ${errorMessage(error)}`, {
              operation: 'init',
              worker_id: message.workerId,
              error_message: errorMessage(error),
            });
            finish(1, { type: 'fatal', message: errorMessage(error) });
          });
          return;

        case 'connection':
          if (handle instanceof Socket) {
            receive(handle);
          } else {
            log.warn('Connection message arrived without a socket', { operation: 'ipc' });
          }
          return;

        case 'drain':
          drain(message.graceMs);
          return;
      }
    });

    port.onDisconnect(() => {
      log.warn('Supervisor disconnected, stopping', { operation: 'ipc' });
      queue.close();
      if (worker) {
        void worker.abort();
      } else {
        finish(1, { type: 'fatal', message: 'supervisor disconnected before init' });
      }
    });
  });
}
