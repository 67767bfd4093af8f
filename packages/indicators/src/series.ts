/**
 * Shared helpers for series validation and rolling windows
 */

import { IndicatorError } from '@bullion/contracts';
import type { IndicatorSeries } from './types.js';

/**
 * @throws IndicatorError if the period is not a positive integer
 */
export function requirePeriod(indicator: string, period: number): void {
  if (!Number.isInteger(period) || period < 1) {
    throw new IndicatorError(`${indicator} period must be a positive integer, received ${period}`, {
      indicator,
      received: period,
    });
  }
}

/**
 * @throws IndicatorError if the series holds fewer than `required` points
 */
export function requireLength(indicator: string, series: readonly unknown[], required: number): void {
  if (series.length < required) {
    throw new IndicatorError(
      `${indicator} needs at least ${required} data points, received ${series.length}`,
      { indicator, required, received: series.length }
    );
  }
}

/**
 * Arithmetic mean of `values[start..end)`.
 */
export function meanOf(values: readonly number[], start: number, end: number): number {
  let sum = 0;
  for (let i = start; i < end; i++) {
    sum += values[i] ?? 0;
  }
  return sum / (end - start);
}

/**
 * Simple rolling mean of width `period`. Positions before `firstDefined`
 * are null; each defined position averages the `period` values ending there.
 */
export function rollingMean(values: readonly number[], period: number, firstDefined: number): (number | null)[] {
  const out: (number | null)[] = [];
  for (let t = 0; t < values.length; t++) {
    out.push(t < firstDefined ? null : meanOf(values, t - period + 1, t + 1));
  }
  return out;
}

/**
 * Last element of a series.
 *
 * @throws IndicatorError when the series is empty or its last value is undefined
 */
export function currentValue(indicator: string, series: IndicatorSeries): number {
  const value = series[series.length - 1];
  if (value === null || value === undefined) {
    throw new IndicatorError(`${indicator} has no defined current value`, {
      indicator,
      received: series.length,
    });
  }
  return value;
}
