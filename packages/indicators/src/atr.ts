/**
 * @fileoverview True range and Average True Range.
 */

import { IndicatorError } from '@bullion/contracts';
import { requireLength, requirePeriod, rollingMean } from './series.js';

/**
 * True range per bar. Index 0 has no previous close and reduces to high - low.
 */
export function trueRange(high: readonly number[], low: readonly number[], close: readonly number[]): number[] {
  if (high.length !== low.length || high.length !== close.length) {
    throw new IndicatorError('High, low and close series must have equal length', {
      indicator: 'ATR',
      received: high.length,
    });
  }

  return high.map((h, t) => {
    const l = low[t] ?? h;
    const highLow = h - l;
    if (t === 0) {
      return highLow;
    }
    const previousClose = close[t - 1] ?? h;
    return Math.max(highLow, Math.abs(h - previousClose), Math.abs(l - previousClose));
  });
}

/**
 * Rolling mean of the true range. The first `period` positions are null.
 *
 * @throws IndicatorError when the series has `period` points or fewer
 */
export function atr(
  high: readonly number[],
  low: readonly number[],
  close: readonly number[],
  period: number
): (number | null)[] {
  requirePeriod('ATR', period);
  requireLength('ATR', close, period + 1);

  return rollingMean(trueRange(high, low, close), period, period);
}
