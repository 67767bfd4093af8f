/**
 * Pivot-point support and resistance
 */

import { requireLength, requirePeriod } from './series.js';
import type { SupportResistanceLevels } from './types.js';

/**
 * Support and resistance from the trailing `lookback` bars.
 * Shorter series use every bar available.
 *
 * @example
 * ```typescript
 * const levels = supportResistance(highs, lows, closes, 20);
 * const nearSupport = price <= levels.support * 1.01;
 * ```
 */
export function supportResistance(
  high: readonly number[],
  low: readonly number[],
  close: readonly number[],
  lookback: number
): SupportResistanceLevels {
  requirePeriod('Support/resistance', lookback);
  requireLength('Support/resistance', close, 1);

  const recentHigh = Math.max(...high.slice(-lookback));
  const recentLow = Math.min(...low.slice(-lookback));
  const currentClose = close[close.length - 1] ?? recentLow;

  const pivot = (recentHigh + recentLow + currentClose) / 3;

  return {
    support: 2 * pivot - recentHigh,
    resistance: 2 * pivot - recentLow,
    pivot,
    recentHigh,
    recentLow,
  };
}
