/**
 * @fileoverview Minimum-interval request throttle.
 *
 * Alpha Vantage's free tier allows five calls per minute, so consecutive
 * requests are spaced at least twelve seconds apart.
 *
 * @module @bullion/market-data/rate-limiter
 */

import type { ClockFn, SleepFn } from './types.js';

export const ALPHA_VANTAGE_MIN_INTERVAL_MS = 12_000;

export interface RateLimiterOptions {
  minIntervalMs?: number;
  now?: ClockFn;
  sleep?: SleepFn;
}

const defaultSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RateLimiter {
  private readonly minIntervalMs: number;
  private readonly now: ClockFn;
  private readonly sleep: SleepFn;
  private lastRequestAt: number | null = null;

  constructor(options: RateLimiterOptions = {}) {
    this.minIntervalMs = options.minIntervalMs ?? ALPHA_VANTAGE_MIN_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Milliseconds a request made now would have to wait.
   */
  pendingDelay(): number {
    if (this.lastRequestAt === null) {
      return 0;
    }
    const elapsed = this.now() - this.lastRequestAt;
    return Math.max(0, this.minIntervalMs - elapsed);
  }

  /**
   * Waits until the next request slot and claims it.
   *
   * @returns The number of milliseconds waited
   */
  async acquire(): Promise<number> {
    const delay = this.pendingDelay();
    if (delay > 0) {
      await this.sleep(delay);
    }
    this.lastRequestAt = this.now();
    return delay;
  }
}
