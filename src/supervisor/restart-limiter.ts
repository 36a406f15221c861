/**
 * Rolling-window restart counter.
 *
 * Records worker restarts and reports whether the count within the window
 * still respects the ceiling.
 */

import type { RestartLimit } from '../config/types.js';

export class RestartLimiter {
  private readonly history: number[] = [];

  constructor(
    private readonly limit: RestartLimit,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Record one restart.
   *
   * @returns false once more than limit.maxRestarts restarts fall within
   *   limit.windowMs
   */
  record(): boolean {
    const now = this.now();
    this.history.push(now);
    this.prune(now);
    return this.history.length <= this.limit.maxRestarts;
  }

  /**
   * Restarts within the current window.
   */
  count(): number {
    this.prune(this.now());
    return this.history.length;
  }

  private prune(now: number): void {
    const cutoff = now - this.limit.windowMs;
    while (this.history.length > 0 && (this.history[0] ?? now) <= cutoff) {
      this.history.shift();
    }
  }
}
