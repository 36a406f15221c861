/**
 * Inline execution model: workers run as async tasks in the supervisor's
 * process and accept directly from the shared Listener.
 *
 * Isolation is weaker than the fork model (a handler that blocks the event
 * loop stalls every worker), which makes it suitable for tests, development
 * and single-process deployments.
 */

import { WorkerEventNames } from '../events/event-names.js';
import type { Handler } from '../http/handler.js';
import type { ConnectionSource } from '../listener/connection-queue.js';
import { createLogger, errorMessage } from '../logging/index.js';
import type { WorkerExitReason, WorkerOptions } from '../worker/types.js';
import { Worker } from '../worker/worker.js';
import { ProcessHandle } from './process-handle.js';
import type { ExitReason, WorkerLauncher } from './types.js';

const log = createLogger({ component: 'inline-launcher' });

export type InlineWorkerOptions = Omit<WorkerOptions, 'id' | 'handler'>;

function toExitReason(reason: WorkerExitReason): ExitReason {
  switch (reason) {
    case 'recycled':
      return 'recycled';
    case 'terminated':
      return 'terminated';
    case 'drained':
    case 'closed':
      return 'drained';
  }
}

/**
 * Handle over a Worker running in this process.
 */
export class InlineProcessHandle extends ProcessHandle {
  readonly worker: Worker;

  constructor(worker: Worker, source: ConnectionSource) {
    super(worker.id);
    this.worker = worker;

    worker.events.on(WorkerEventNames.WORKER_STATUS, ({ status }) => {
      if (status !== 'dead') {
        this.emit('status', status);
      }
    });
    worker.events.on(WorkerEventNames.WORKER_HEARTBEAT, ({ timestamp }) => {
      this.emit('heartbeat', timestamp.getTime());
    });

    // Deferred so the spawner can subscribe before the first status event
    Promise.resolve()
      .then(() => worker.run(source))
      .then(
        (reason) => {
          this.markExited({ code: 0, signal: null, reason: toExitReason(reason) });
        },
        (error: unknown) => {
          log.error(`Worker ${this.id} failed: ${errorMessage(error)}`, {
            worker_id: this.id,
            error_message: errorMessage(error),
          });
          this.markExited({ code: 1, signal: null, reason: 'crashed', error: errorMessage(error) });
        }
      );
  }

  get pid(): number | null {
    return null;
  }

  drain(graceMs: number): void {
    void this.worker.drain(graceMs);
  }

  terminate(): void {
    void this.worker.abort();
  }
}

/**
 * Launches workers as async tasks sharing one connection source.
 */
export class InlineWorkerLauncher implements WorkerLauncher {
  readonly model = 'inline';

  constructor(
    private readonly source: ConnectionSource,
    private readonly handler: Handler,
    private readonly options: InlineWorkerOptions = {}
  ) {}

  spawn(workerId: string): ProcessHandle {
    const worker = new Worker({ ...this.options, id: workerId, handler: this.handler });
    return new InlineProcessHandle(worker, this.source);
  }
}
