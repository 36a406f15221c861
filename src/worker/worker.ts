/**
 * Worker - accepts connections and serves HTTP/1.1 requests.
 *
 * A Worker pulls connections from a ConnectionSource (the shared Listener,
 * or the IPC-fed queue of a worker process) while it has spare capacity,
 * parses requests with Node's HTTP parser, runs the application handler
 * under a per-request deadline and writes the response.
 *
 * Request-scoped failures never end the loop:
 * - malformed request: 400 (431 for oversized headers), connection closed
 * - handler error: 500, worker keeps serving
 * - deadline exceeded: 503, connection closed
 *
 * @example
 * ```typescript
 * const worker = new Worker({ id: 'worker-1', handler: app });
 * const exit = worker.run(listener);
 *
 * // Later: stop accepting, finish in-flight requests within 5s
 * await worker.drain(5000);
 * console.log(await exit); // 'drained'
 * ```
 */

import http, { type IncomingMessage, type OutgoingHttpHeaders, type ServerResponse } from 'node:http';
import type { Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import { Readable } from 'node:stream';
import { WritableStream } from 'node:stream/web';
import { WorkerEventEmitter } from '../events/event-emitter.js';
import { WorkerEventNames } from '../events/event-names.js';
import type { Handler } from '../http/handler.js';
import type { Request, RequestBody } from '../http/request.js';
import type { Response } from '../http/response.js';
import type { ConnectionSource } from '../listener/connection-queue.js';
import { type ComponentLogger, createLogger, errorMessage } from '../logging/index.js';
import { HandlerError, ParseError, RequestTimeoutError } from '../types/errors.js';
import {
  type WorkerExitReason,
  type WorkerOptions,
  type WorkerStats,
  type WorkerStatus,
  WorkerStatuses,
} from './types.js';

type ResolvedWorkerOptions = Required<Omit<WorkerOptions, 'id' | 'handler'>>;

const DEFAULT_WORKER_OPTIONS: ResolvedWorkerOptions = {
  requestTimeoutMs: 30_000,
  keepAliveTimeoutMs: 2_000,
  maxRequestsPerConnection: 100,
  workerConnections: 1_000,
  heartbeatIntervalMs: 1_000,
  maxRequests: 0,
  maxRequestsJitter: 0,
  gracefulTimeoutMs: 30_000,
  maxHeaderSize: 16_384,
};

interface ConnectionState {
  inflight: number;
  served: number;
}

/**
 * Thrown into in-flight requests when the worker is force-closed.
 */
class WorkerAbortedError extends Error {
  constructor() {
    super('Worker closed before the request finished');
    this.name = 'WorkerAbortedError';
  }
}

export class Worker {
  readonly id: string;
  readonly events = new WorkerEventEmitter();

  private readonly handler: Handler;
  private readonly options: ResolvedWorkerOptions;
  private readonly httpServer: http.Server;
  private readonly log: ComponentLogger;
  private readonly requestBudget: number;

  private status: WorkerStatus = WorkerStatuses.STARTING;
  private readonly connections = new Map<Socket, ConnectionState>();
  private readonly inflight = new Set<AbortController>();
  private readonly acceptAbort = new AbortController();
  private capacityWaiter: (() => void) | null = null;

  private running = false;
  private forced = false;
  private exitReason: WorkerExitReason = 'drained';
  private readonly finished: Promise<WorkerExitReason>;
  private resolveFinished: ((reason: WorkerExitReason) => void) | null = null;

  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private graceTimer: ReturnType<typeof setTimeout> | null = null;

  private requestCount = 0;
  private activeRequests = 0;
  private handled = 0;
  private failed = 0;
  private parseErrors = 0;
  private timeouts = 0;

  constructor(options: WorkerOptions) {
    this.id = options.id;
    this.handler = options.handler;
    this.options = {
      requestTimeoutMs: options.requestTimeoutMs ?? DEFAULT_WORKER_OPTIONS.requestTimeoutMs,
      keepAliveTimeoutMs: options.keepAliveTimeoutMs ?? DEFAULT_WORKER_OPTIONS.keepAliveTimeoutMs,
      maxRequestsPerConnection:
        options.maxRequestsPerConnection ?? DEFAULT_WORKER_OPTIONS.maxRequestsPerConnection,
      workerConnections: options.workerConnections ?? DEFAULT_WORKER_OPTIONS.workerConnections,
      heartbeatIntervalMs: options.heartbeatIntervalMs ?? DEFAULT_WORKER_OPTIONS.heartbeatIntervalMs,
      maxRequests: options.maxRequests ?? DEFAULT_WORKER_OPTIONS.maxRequests,
      maxRequestsJitter: options.maxRequestsJitter ?? DEFAULT_WORKER_OPTIONS.maxRequestsJitter,
      gracefulTimeoutMs: options.gracefulTimeoutMs ?? DEFAULT_WORKER_OPTIONS.gracefulTimeoutMs,
      maxHeaderSize: options.maxHeaderSize ?? DEFAULT_WORKER_OPTIONS.maxHeaderSize,
    };
    this.log = createLogger({ component: 'worker', worker_id: this.id });

    this.requestBudget =
      this.options.maxRequests > 0
        ? this.options.maxRequests +
          Math.floor(Math.random() * (this.options.maxRequestsJitter + 1))
        : 0;

    this.finished = new Promise<WorkerExitReason>((resolve) => {
      this.resolveFinished = resolve;
    });

    this.httpServer = http.createServer({ maxHeaderSize: this.options.maxHeaderSize }, (req, res) => {
      this.dispatch(req, res).catch((error) => {
        this.log.error(`Unhandled error dispatching request: ${errorMessage(error)}`, {
          operation: 'dispatch',
          error_message: errorMessage(error),
        });
        res.destroy();
      });
    });
    this.httpServer.keepAliveTimeout = this.options.keepAliveTimeoutMs;
    this.httpServer.maxRequestsPerSocket = this.options.maxRequestsPerConnection;
    this.httpServer.on('clientError', (error, socket) => this.onClientError(error, socket));
    this.httpServer.on('timeout', (socket: Socket) => this.onIdleTimeout(socket));
  }

  // ==========================================================================
  // Properties
  // ==========================================================================

  getStatus(): WorkerStatus {
    return this.status;
  }

  getStats(): WorkerStats {
    return {
      handled: this.handled,
      failed: this.failed,
      parseErrors: this.parseErrors,
      timeouts: this.timeouts,
      activeRequests: this.activeRequests,
      activeConnections: this.connections.size,
    };
  }

  /**
   * Request count after which the worker recycles itself; 0 when disabled.
   */
  getRequestBudget(): number {
    return this.requestBudget;
  }

  // ==========================================================================
  // Lifecycle Methods
  // ==========================================================================

  /**
   * Accept and serve connections until drained, recycled or terminated.
   *
   * @returns Why the worker stopped
   */
  async run(source: ConnectionSource): Promise<WorkerExitReason> {
    if (this.running) {
      throw new Error(`Worker ${this.id} is already running`);
    }
    if (this.status !== WorkerStatuses.STARTING) {
      return this.finished;
    }
    this.running = true;

    this.startHeartbeat();
    this.setStatus(WorkerStatuses.READY);
    this.log.debug('Worker accepting connections', { operation: 'run' });

    await this.acceptLoop(source);
    return this.finished;
  }

  /**
   * Serve a connection handed over outside the accept loop.
   *
   * Allowed while the worker is draining: the connection is served with
   * Connection: close. Destroyed once the worker is dead.
   */
  adopt(socket: Socket): void {
    if (this.status === WorkerStatuses.DEAD) {
      socket.destroy();
      return;
    }
    this.serve(socket);
  }

  /**
   * Stop accepting, finish in-flight requests within graceMs, then exit.
   *
   * Requests still running when the grace period expires are aborted and
   * their connections destroyed.
   */
  drain(graceMs: number): Promise<WorkerExitReason> {
    this.beginDrain(graceMs, 'drained');
    return this.finished;
  }

  /**
   * Stop immediately, destroying every connection.
   */
  abort(): Promise<WorkerExitReason> {
    if (this.status !== WorkerStatuses.DEAD) {
      this.exitReason = 'terminated';
      this.acceptAbort.abort();
      this.forceClose();
    }
    return this.finished;
  }

  // ==========================================================================
  // Accept loop
  // ==========================================================================

  private isAccepting(): boolean {
    return this.status === WorkerStatuses.READY || this.status === WorkerStatuses.BUSY;
  }

  private async acceptLoop(source: ConnectionSource): Promise<void> {
    while (this.isAccepting()) {
      if (this.connections.size >= this.options.workerConnections) {
        await this.waitForCapacity();
        continue;
      }

      const socket = await source.accept(this.acceptAbort.signal);
      if (socket === null) {
        if (this.isAccepting()) {
          this.log.info('Connection source closed, draining', { operation: 'accept' });
          this.beginDrain(this.options.gracefulTimeoutMs, 'closed');
        }
        return;
      }

      this.serve(socket);
    }
  }

  private waitForCapacity(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.capacityWaiter = () => {
        this.capacityWaiter = null;
        resolve();
      };
    });
  }

  private serve(socket: Socket): void {
    this.connections.set(socket, { inflight: 0, served: 0 });
    socket.once('close', () => {
      this.connections.delete(socket);
      this.refreshLoad();
      this.capacityWaiter?.();
      this.checkDrained();
    });
    // A connection must deliver its first request within the request deadline
    socket.setTimeout(this.options.requestTimeoutMs);
    this.refreshLoad();

    this.log.trace('Accepted connection', {
      operation: 'accept',
      remote_address: socket.remoteAddress,
      active_connections: this.connections.size,
    });
    this.httpServer.emit('connection', socket);
  }

  // ==========================================================================
  // Request handling
  // ==========================================================================

  private async dispatch(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const startedAt = Date.now();
    const method = req.method ?? 'GET';
    const path = req.url ?? '/';
    const connection = this.connections.get(req.socket);
    const controller = new AbortController();

    if (connection) {
      connection.inflight++;
      connection.served++;
    }
    req.socket.setTimeout(0);
    this.inflight.add(controller);
    this.requestCount++;
    this.activeRequests++;
    this.refreshLoad();

    const deadline = setTimeout(() => {
      controller.abort(new RequestTimeoutError(this.options.requestTimeoutMs));
    }, this.options.requestTimeoutMs);

    try {
      let request: Request;
      try {
        request = toRequest(req, controller.signal);
      } catch (error) {
        this.rejectMalformed(res, error);
        return;
      }

      const status = await this.withDeadline(controller.signal, async () => {
        const response = await this.handler(request);
        await this.writeResponse(res, response, this.shouldCloseAfterResponse());
        return response.status;
      });

      this.handled++;
      const durationMs = Date.now() - startedAt;
      this.log.debug(`${method} ${path} ${status}`, {
        operation: 'request',
        status,
        duration_ms: durationMs,
      });
      this.events.emit(WorkerEventNames.REQUEST_COMPLETED, {
        workerId: this.id,
        method,
        path,
        status,
        durationMs,
      });
    } catch (error) {
      this.onRequestError(res, method, path, error, Date.now() - startedAt);
    } finally {
      clearTimeout(deadline);
      this.inflight.delete(controller);
      this.activeRequests--;
      if (connection) {
        connection.inflight--;
      }
      this.afterRequest(req.socket, res, connection);
    }
  }

  private withDeadline<T>(signal: AbortSignal, fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        reject(signal.reason instanceof Error ? signal.reason : new WorkerAbortedError());
      };
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      fn()
        .then(resolve, reject)
        .finally(() => signal.removeEventListener('abort', onAbort));
    });
  }

  private shouldCloseAfterResponse(): boolean {
    if (this.status === WorkerStatuses.DRAINING) {
      return true;
    }
    return this.requestBudget > 0 && this.requestCount >= this.requestBudget;
  }

  private async writeResponse(
    res: ServerResponse,
    response: Response,
    closeConnection: boolean
  ): Promise<void> {
    const headers = toOutgoingHeaders(response.headers);
    if (closeConnection) {
      headers.connection = 'close';
    }
    res.writeHead(response.status, headers);

    if (response.body) {
      await response.body(toWritableStream(res));
    }
    res.end();
  }

  private onRequestError(
    res: ServerResponse,
    method: string,
    path: string,
    error: unknown,
    durationMs: number
  ): void {
    if (error instanceof WorkerAbortedError || this.forced) {
      this.log.warn(`${method} ${path} aborted by worker shutdown`, {
        operation: 'request',
        duration_ms: durationMs,
      });
      res.destroy();
      return;
    }

    let failure: Error;
    if (error instanceof RequestTimeoutError) {
      this.timeouts++;
      failure = error;
      this.log.warn(`${method} ${path} exceeded deadline of ${error.timeoutMs}ms`, {
        operation: 'request',
        error_type: error.errorType,
        duration_ms: durationMs,
      });
      this.respondWithError(res, 503, true);
    } else {
      this.failed++;
      failure = new HandlerError(method, path, error);
      this.log.error(failure.message, {
        operation: 'request',
        error_type: 'handler_error',
        error_message: errorMessage(error),
        duration_ms: durationMs,
      });
      this.respondWithError(res, 500, this.shouldCloseAfterResponse());
    }

    this.events.emit(WorkerEventNames.REQUEST_FAILED, {
      workerId: this.id,
      method,
      path,
      error: failure,
      durationMs,
    });
  }

  private rejectMalformed(res: ServerResponse, error: unknown): void {
    this.parseErrors++;
    const parseError = new ParseError(`Malformed request target: ${errorMessage(error)}`, 400, undefined, {
      cause: error,
    });
    this.log.warn(parseError.message, { operation: 'parse', error_type: parseError.errorType });
    this.events.emit(WorkerEventNames.REQUEST_PARSE_ERROR, {
      workerId: this.id,
      error: parseError,
      statusCode: parseError.statusCode,
    });
    this.respondWithError(res, parseError.statusCode, true);
  }

  /**
   * Send a plain-text error reply, or reset the connection when the
   * response has already started.
   */
  private respondWithError(res: ServerResponse, statusCode: number, closeConnection: boolean): void {
    if (res.headersSent || res.destroyed) {
      res.destroy();
      return;
    }
    const reason = http.STATUS_CODES[statusCode] ?? 'Error';
    const headers: OutgoingHttpHeaders = {
      'content-type': 'text/plain; charset=utf-8',
      'content-length': Buffer.byteLength(reason),
    };
    if (closeConnection) {
      headers.connection = 'close';
    }
    res.writeHead(statusCode, headers);
    res.end(reason);
  }

  private onClientError(error: Error, socket: Duplex): void {
    const code = errorCode(error);
    if (code === 'ECONNRESET' || !socket.writable) {
      socket.destroy();
      return;
    }

    const statusCode =
      code === 'HPE_HEADER_OVERFLOW' ? 431 : code === 'ERR_HTTP_REQUEST_TIMEOUT' ? 408 : 400;
    const parseError = new ParseError(error.message, statusCode, code, { cause: error });
    this.parseErrors++;

    this.log.warn(`Rejected malformed request: ${error.message}`, {
      operation: 'parse',
      error_type: parseError.errorType,
      code,
      status: statusCode,
    });
    this.events.emit(WorkerEventNames.REQUEST_PARSE_ERROR, {
      workerId: this.id,
      error: parseError,
      statusCode,
    });

    const reason = http.STATUS_CODES[statusCode] ?? 'Bad Request';
    socket.end(
      `HTTP/1.1 ${statusCode} ${reason}\r\n` +
        'Connection: close\r\n' +
        'Content-Type: text/plain; charset=utf-8\r\n' +
        `Content-Length: ${Buffer.byteLength(reason)}\r\n` +
        `\r\n${reason}`
    );
  }

  private afterRequest(
    socket: Socket,
    res: ServerResponse,
    connection: ConnectionState | undefined
  ): void {
    this.refreshLoad();

    if (connection?.inflight === 0 && !socket.destroyed) {
      socket.setTimeout(this.idleTimeoutMs());
    }

    if (this.status === WorkerStatuses.DRAINING && connection?.inflight === 0) {
      // Keep-alive responses started before the drain still hold the socket
      if (res.writableFinished) {
        socket.end();
      } else {
        res.once('finish', () => socket.end());
      }
    }

    if (this.requestBudget > 0 && this.requestCount >= this.requestBudget && this.isAccepting()) {
      this.log.info(`Served ${this.requestCount} requests, recycling`, {
        operation: 'recycle',
        request_budget: this.requestBudget,
      });
      this.beginDrain(this.options.gracefulTimeoutMs, 'recycled');
    }

    this.checkDrained();
  }

  // ==========================================================================
  // Drain and shutdown
  // ==========================================================================

  private beginDrain(graceMs: number, reason: WorkerExitReason): void {
    if (this.status === WorkerStatuses.DRAINING || this.status === WorkerStatuses.DEAD) {
      return;
    }

    this.exitReason = reason;
    this.setStatus(WorkerStatuses.DRAINING);
    this.acceptAbort.abort();
    this.capacityWaiter?.();

    // Connections still waiting on their first request get it answered
    // with Connection: close, or fall to the idle deadline.
    let idle = 0;
    for (const [socket, state] of this.connections) {
      if (state.inflight === 0 && state.served > 0) {
        socket.destroy();
        idle++;
      }
    }

    this.log.info('Draining', {
      operation: 'drain',
      reason,
      grace_ms: graceMs,
      in_flight: this.activeRequests,
      idle_connections_closed: idle,
    });

    this.graceTimer = setTimeout(() => {
      this.graceTimer = null;
      if (this.status === WorkerStatuses.DRAINING) {
        this.log.warn(`Grace period expired, aborting ${this.activeRequests} requests`, {
          operation: 'drain',
          in_flight: this.activeRequests,
        });
        this.forceClose();
      }
    }, graceMs);

    this.checkDrained();
  }

  /**
   * Close a connection that sat without a request in flight past its
   * deadline: before its first request, between keep-alive requests, or
   * partway through sending request headers.
   */
  private onIdleTimeout(socket: Socket): void {
    const connection = this.connections.get(socket);
    if (connection && connection.inflight > 0) {
      return;
    }
    this.log.trace('Closing idle connection', {
      operation: 'idle',
      remote_address: socket.remoteAddress,
    });
    socket.destroy();
  }

  private idleTimeoutMs(): number {
    return this.options.keepAliveTimeoutMs > 0
      ? this.options.keepAliveTimeoutMs
      : this.options.requestTimeoutMs;
  }

  private checkDrained(): void {
    if (this.status === WorkerStatuses.DRAINING && this.connections.size === 0) {
      this.finish();
    }
  }

  private forceClose(): void {
    this.forced = true;
    for (const controller of this.inflight) {
      controller.abort(new WorkerAbortedError());
    }
    for (const socket of this.connections.keys()) {
      socket.destroy();
    }
    this.finish();
  }

  private finish(): void {
    if (this.status === WorkerStatuses.DEAD) {
      return;
    }
    if (this.graceTimer) {
      clearTimeout(this.graceTimer);
      this.graceTimer = null;
    }
    this.stopHeartbeat();
    this.acceptAbort.abort();
    this.setStatus(WorkerStatuses.DEAD);

    this.log.info('Worker stopped', {
      operation: 'stop',
      reason: this.exitReason,
      handled: this.handled,
      failed: this.failed,
    });
    this.resolveFinished?.(this.exitReason);
  }

  // ==========================================================================
  // Status and heartbeat
  // ==========================================================================

  /**
   * ready while the worker can take another request; busy while a request
   * runs or every connection slot is taken.
   */
  private refreshLoad(): void {
    if (!this.isAccepting()) {
      return;
    }
    const saturated =
      this.activeRequests > 0 || this.connections.size >= this.options.workerConnections;
    this.setStatus(saturated ? WorkerStatuses.BUSY : WorkerStatuses.READY);
  }

  private setStatus(status: WorkerStatus): void {
    const previous = this.status;
    if (previous === status) {
      return;
    }
    this.status = status;
    this.events.emit(WorkerEventNames.WORKER_STATUS, {
      workerId: this.id,
      status,
      previous,
      timestamp: new Date(),
    });
  }

  private startHeartbeat(): void {
    this.beat();
    this.heartbeatTimer = setInterval(() => this.beat(), this.options.heartbeatIntervalMs);
    this.heartbeatTimer.unref?.();
  }

  private beat(): void {
    this.events.emit(WorkerEventNames.WORKER_HEARTBEAT, {
      workerId: this.id,
      timestamp: new Date(),
    });
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }
}

// ==========================================================================
// Conversion helpers
// ==========================================================================

function toRequest(req: IncomingMessage, signal: AbortSignal): Request {
  const host = req.headers.host ?? 'localhost';
  const url = new URL(req.url ?? '/', `http://${host}`);

  const headers = new Headers();
  const raw = req.rawHeaders;
  for (let i = 0; i + 1 < raw.length; i += 2) {
    const name = raw[i];
    const value = raw[i + 1];
    if (name !== undefined && value !== undefined) {
      headers.append(name, value);
    }
  }

  let body: RequestBody | null = null;
  return {
    url,
    method: req.method ?? 'GET',
    headers,
    httpVersion: req.httpVersion,
    remoteAddress: req.socket.remoteAddress,
    signal,
    get body(): RequestBody {
      if (body === null) {
        body = Readable.toWeb(req);
      }
      return body;
    },
  };
}

function toOutgoingHeaders(headers: Headers | undefined): OutgoingHttpHeaders {
  const result: OutgoingHttpHeaders = {};
  headers?.forEach((value, key) => {
    const existing = result[key];
    if (existing === undefined) {
      result[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      result[key] = [String(existing), value];
    }
  });
  return result;
}

function toWritableStream(res: ServerResponse): WritableStream<Uint8Array> {
  return new WritableStream<Uint8Array>({
    write(chunk) {
      return new Promise<void>((resolve, reject) => {
        if (res.destroyed) {
          reject(new Error('Response stream destroyed'));
          return;
        }
        res.write(chunk, (error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
    },
  });
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
