/**
 * @fileoverview Bar series validation.
 *
 * Gatekeeper between market-data providers and the signal core: anything that
 * reaches the indicator engine has passed these checks.
 *
 * @module @bullion/contracts/bar-series
 */

import { InvalidBarSeriesError } from './errors.js';
import { MIN_ANALYSIS_BARS, type BarSeries, type MarketBar } from './market.js';
import { err, ok, type Result } from './result.js';

const PRICE_FIELDS = ['open', 'high', 'low', 'close', 'volume'] as const;

/**
 * Checks a single bar for numeric fields and OHLC ordering.
 *
 * @returns A reason string when the bar is invalid, otherwise null
 */
export function checkBar(bar: MarketBar): string | null {
  for (const field of PRICE_FIELDS) {
    const value = bar[field];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      return `${field} must be a finite number`;
    }
  }

  if (bar.high < Math.max(bar.open, bar.close, bar.low)) {
    return 'high must be >= open, close and low';
  }

  if (bar.low > Math.min(bar.open, bar.close, bar.high)) {
    return 'low must be <= open, close and high';
  }

  if (bar.volume < 0) {
    return 'volume cannot be negative';
  }

  if (Number.isNaN(Date.parse(bar.timestamp))) {
    return 'timestamp must be an ISO 8601 string';
  }

  return null;
}

/**
 * Validates a bar series for analysis.
 *
 * Rejects empty or short series, malformed bars and non-increasing
 * timestamps. The returned series is the input, frozen.
 *
 * @param bars - Candidate bars in chronological order
 * @param minBars - Minimum length required
 */
export function validateBarSeries(
  bars: readonly MarketBar[],
  minBars: number = MIN_ANALYSIS_BARS
): Result<BarSeries, InvalidBarSeriesError> {
  if (bars.length === 0) {
    return err(new InvalidBarSeriesError('Bar series is empty', { reason: 'empty' }));
  }

  if (bars.length < minBars) {
    return err(
      new InvalidBarSeriesError(`Need at least ${minBars} bars, received ${bars.length}`, {
        reason: 'insufficient_bars',
        required: minBars,
        received: bars.length,
      })
    );
  }

  let previousTime = Number.NEGATIVE_INFINITY;
  for (let index = 0; index < bars.length; index++) {
    const bar = bars[index];
    if (!bar) {
      return err(new InvalidBarSeriesError(`Missing bar at index ${index}`, { reason: 'missing_bar', index }));
    }

    const problem = checkBar(bar);
    if (problem) {
      return err(new InvalidBarSeriesError(`Invalid bar at index ${index}: ${problem}`, { reason: problem, index }));
    }

    const time = Date.parse(bar.timestamp);
    if (time <= previousTime) {
      return err(
        new InvalidBarSeriesError(`Timestamps must be strictly increasing (index ${index})`, {
          reason: 'timestamp_order',
          index,
        })
      );
    }
    previousTime = time;
  }

  return ok(Object.freeze([...bars]));
}
