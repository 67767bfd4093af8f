/**
 * @fileoverview Performance timing for analysis runs and provider calls.
 * Uses performance.now() for sub-millisecond resolution.
 */

export interface PerfTimer {
  /** Start time in milliseconds (high-resolution) */
  readonly startTime: number;

  /** Milliseconds since start, rounded */
  elapsed(): number;

  /** Stops the timer (idempotent) and returns the final duration */
  stop(): number;

  isRunning(): boolean;
}

interface TimerState {
  startTime: number;
  endTime: number | null;
}

/**
 * @example
 * ```typescript
 * const timer = startTimer();
 * const bars = await source.getBars('GLD', ChartTimeframe.OneDay);
 * logger.info('Bars fetched', { duration_ms: timer.stop(), count: bars.length });
 * ```
 */
export function startTimer(): PerfTimer {
  const state: TimerState = {
    startTime: performance.now(),
    endTime: null,
  };

  return {
    get startTime() {
      return state.startTime;
    },

    elapsed(): number {
      const endTime = state.endTime ?? performance.now();
      return Math.round(endTime - state.startTime);
    },

    stop(): number {
      if (state.endTime === null) {
        state.endTime = performance.now();
      }
      return Math.round(state.endTime - state.startTime);
    },

    isRunning(): boolean {
      return state.endTime === null;
    },
  };
}

/**
 * Measures a synchronous function.
 *
 * @example
 * ```typescript
 * const { result: signal, duration_ms } = measureSync(() => generateSignal(bars, config));
 * ```
 */
export function measureSync<T>(fn: () => T): { result: T; duration_ms: number } {
  const timer = startTimer();
  const result = fn();
  const duration_ms = timer.stop();
  return { result, duration_ms };
}

/**
 * Measures an async function.
 */
export async function measureAsync<T>(fn: () => Promise<T>): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  const duration_ms = timer.stop();
  return { result, duration_ms };
}
