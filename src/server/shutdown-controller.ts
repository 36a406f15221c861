/**
 * Shutdown controller for coordinating graceful and immediate shutdown.
 *
 * Provides a signal-based mechanism for triggering and awaiting
 * shutdown across async boundaries.
 */

import { createLogger, errorMessage } from '../logging/index.js';

const log = createLogger({ component: 'shutdown' });

/**
 * Shutdown signal handler type.
 */
export type ShutdownHandler = () => void | Promise<void>;

/**
 * How in-flight work is treated: graceful drains within the grace period,
 * immediate aborts it.
 */
export type ShutdownMode = 'graceful' | 'immediate';

/**
 * Controller for coordinating shutdown.
 *
 * Provides a promise-based mechanism for waiting on shutdown requests
 * and executing cleanup handlers in order. A second graceful request
 * while a graceful shutdown is running escalates it to immediate.
 *
 * @example
 * ```typescript
 * const shutdown = new ShutdownController();
 *
 * process.on('SIGTERM', () => shutdown.trigger('SIGTERM', 'graceful'));
 * process.on('SIGINT', () => shutdown.trigger('SIGINT', 'immediate'));
 * shutdown.onEscalate(() => killEverything());
 *
 * // Wait for a shutdown request
 * const mode = await shutdown.promise;
 * ```
 */
export class ShutdownController {
  private _shutdownRequested = false;
  private _resolver: ((mode: ShutdownMode) => void) | null = null;
  private _signal: string | null = null;
  private _mode: ShutdownMode | null = null;
  private readonly _handlers: ShutdownHandler[] = [];
  private readonly _escalationListeners: Array<() => void> = [];

  /**
   * Promise that resolves with the requested mode when shutdown is triggered.
   */
  readonly promise: Promise<ShutdownMode>;

  constructor() {
    this.promise = new Promise<ShutdownMode>((resolve) => {
      this._resolver = resolve;
    });
  }

  /**
   * Check if shutdown has been requested.
   */
  get isRequested(): boolean {
    return this._shutdownRequested;
  }

  /**
   * Get the signal or source that triggered shutdown, if any.
   */
  get signal(): string | null {
    return this._signal;
  }

  /**
   * Current shutdown mode, null until requested.
   */
  get mode(): ShutdownMode | null {
    return this._mode;
  }

  /**
   * Register a handler to be called during shutdown.
   *
   * Handlers are called in registration order.
   */
  onShutdown(handler: ShutdownHandler): void {
    this._handlers.push(handler);
  }

  /**
   * Register a listener called when a graceful shutdown becomes immediate.
   */
  onEscalate(listener: () => void): void {
    this._escalationListeners.push(listener);
  }

  /**
   * Request shutdown.
   *
   * @param signal - What triggered shutdown (e.g., 'SIGTERM', 'api')
   * @param mode - Requested mode (default: graceful)
   * @returns true when this request started or escalated shutdown
   */
  trigger(signal: string, mode: ShutdownMode = 'graceful'): boolean {
    if (this._shutdownRequested) {
      if (this._mode === 'graceful') {
        log.warn(`Received ${signal} during graceful shutdown, shutting down immediately`, {
          operation: 'shutdown',
          signal,
          original_signal: this._signal ?? 'unknown',
        });
        this._mode = 'immediate';
        for (const listener of this._escalationListeners) {
          listener();
        }
        return true;
      }

      log.warn(`Shutdown already requested, ignoring ${signal}`, {
        operation: 'shutdown',
        signal,
        original_signal: this._signal ?? 'unknown',
      });
      return false;
    }

    log.info(`Received ${signal}, initiating ${mode} shutdown...`, {
      operation: 'shutdown',
      signal,
      mode,
    });

    this._shutdownRequested = true;
    this._signal = signal;
    this._mode = mode;
    this._resolver?.(mode);
    return true;
  }

  /**
   * Execute all registered shutdown handlers.
   *
   * Handlers are called in registration order. Errors are logged
   * but do not prevent subsequent handlers from running.
   */
  async executeHandlers(): Promise<void> {
    for (const handler of this._handlers) {
      try {
        await handler();
      } catch (error) {
        log.error(`Shutdown handler failed: ${errorMessage(error)}`, {
          operation: 'shutdown',
          error_message: errorMessage(error),
        });
      }
    }
  }
}
