/**
 * Exponential moving average
 */

import { requireLength, requirePeriod } from './series.js';

/**
 * Exponential moving average with smoothing factor 2 / (period + 1).
 *
 * The first output equals the first input (no warm-up averaging), so every
 * position is defined.
 *
 * @param series - Values in chronological order
 * @param period - Smoothing period
 * @throws IndicatorError on an empty series or a non-positive period
 *
 * @example
 * ```typescript
 * const closes = bars.map((bar) => bar.close);
 * const fast = ema(closes, 9);
 * ```
 */
export function ema(series: readonly number[], period: number): number[] {
  requirePeriod('EMA', period);
  requireLength('EMA', series, 1);

  const alpha = 2 / (period + 1);
  const out: number[] = [];
  let previous = 0;

  series.forEach((value, i) => {
    previous = i === 0 ? value : alpha * value + (1 - alpha) * previous;
    out.push(previous);
  });

  return out;
}
