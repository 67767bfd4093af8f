/**
 * @fileoverview EMA crossover and trend analyzer.
 */

import type { IndicatorSnapshot } from '@bullion/indicators';
import type { TrendJudgment } from '@bullion/contracts';
import type { SignalEngineConfig } from '../types.js';

/** Trend strength above which a trend alone produces a signal. */
const TREND_ONLY_THRESHOLD = 2.0;

/** Trend-only signals carry half the trend strength. */
const TREND_ONLY_FACTOR = 0.5;

/**
 * Judges the fast/slow EMA pair.
 *
 * A crossover on the last bar decides direction and strength outright.
 * Without one, a trend stronger than 2.0 yields a discounted signal in
 * its direction; otherwise the factor holds.
 */
export function analyzeTrend(snapshot: IndicatorSnapshot, config: SignalEngineConfig): TrendJudgment {
  const { crossover, trend } = snapshot;
  const fast = `EMA-${config.emaShortPeriod}`;
  const slow = `EMA-${config.emaLongPeriod}`;

  const detail = {
    crossoverType: crossover.crossover,
    trendDirection: trend.direction,
    trendStrength: trend.strength,
  };

  if (crossover.crossover === 'BULLISH') {
    return { ...detail, direction: 'BUY', strength: crossover.strength, reasons: [`${fast} crossed above ${slow}`] };
  }
  if (crossover.crossover === 'BEARISH') {
    return { ...detail, direction: 'SELL', strength: crossover.strength, reasons: [`${fast} crossed below ${slow}`] };
  }

  const separation = trend.separationPercent.toFixed(2);
  if (trend.direction === 'BULLISH' && trend.strength > TREND_ONLY_THRESHOLD) {
    return {
      ...detail,
      direction: 'BUY',
      strength: trend.strength * TREND_ONLY_FACTOR,
      reasons: [`Strong bullish trend (separation: ${separation}%)`],
    };
  }
  if (trend.direction === 'BEARISH' && trend.strength > TREND_ONLY_THRESHOLD) {
    return {
      ...detail,
      direction: 'SELL',
      strength: trend.strength * TREND_ONLY_FACTOR,
      reasons: [`Strong bearish trend (separation: ${separation}%)`],
    };
  }

  return { ...detail, direction: 'HOLD', strength: 0, reasons: ['No significant EMA signal'] };
}
