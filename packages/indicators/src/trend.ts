/**
 * Trend strength and crossover detection from a fast/slow EMA pair
 */

import { MAX_TREND_STRENGTH } from './config.js';
import { requireLength } from './series.js';
import type { CrossoverAnalysis, TrendAnalysis } from './types.js';

/**
 * Percentage distance of `short` from `long`, 0 when `long` is 0.
 */
function separationPercent(short: number, long: number): number {
  return long === 0 ? 0 : (Math.abs(short - long) / long) * 100;
}

/**
 * Direction and strength of the trend on the last position.
 *
 * @throws IndicatorError if either series is empty
 */
export function trendStrength(emaShort: readonly number[], emaLong: readonly number[]): TrendAnalysis {
  requireLength('Trend strength', emaShort, 1);
  requireLength('Trend strength', emaLong, 1);

  const short = emaShort[emaShort.length - 1] ?? 0;
  const long = emaLong[emaLong.length - 1] ?? 0;
  const separation = separationPercent(short, long);

  if (short === long) {
    return { direction: 'NEUTRAL', strength: 0, separationPercent: separation, emaShort: short, emaLong: long };
  }

  return {
    direction: short > long ? 'BULLISH' : 'BEARISH',
    strength: Math.min(separation / 2, MAX_TREND_STRENGTH),
    separationPercent: separation,
    emaShort: short,
    emaLong: long,
  };
}

/**
 * Compares the last two positions of the EMA pair.
 *
 * BULLISH when the fast EMA moved from at-or-below to above the slow one,
 * BEARISH for the mirror case. Fewer than two points yield NONE.
 */
export function detectCrossover(emaShort: readonly number[], emaLong: readonly number[]): CrossoverAnalysis {
  const n = Math.min(emaShort.length, emaLong.length);
  if (n < 2) {
    return { crossover: 'NONE', strength: 0, currentSeparation: 0, previousSeparation: 0 };
  }

  const currentShort = emaShort[emaShort.length - 1] ?? 0;
  const currentLong = emaLong[emaLong.length - 1] ?? 0;
  const previousShort = emaShort[emaShort.length - 2] ?? 0;
  const previousLong = emaLong[emaLong.length - 2] ?? 0;

  const currentSeparation = Math.abs(currentShort - currentLong);
  const previousSeparation = Math.abs(previousShort - previousLong);
  const decisiveness = Math.min(separationPercent(currentShort, currentLong), MAX_TREND_STRENGTH);

  if (previousShort <= previousLong && currentShort > currentLong) {
    return { crossover: 'BULLISH', strength: decisiveness, currentSeparation, previousSeparation };
  }
  if (previousShort >= previousLong && currentShort < currentLong) {
    return { crossover: 'BEARISH', strength: decisiveness, currentSeparation, previousSeparation };
  }

  return { crossover: 'NONE', strength: 0, currentSeparation, previousSeparation };
}
