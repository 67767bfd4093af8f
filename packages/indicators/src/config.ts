/**
 * @fileoverview Default indicator periods and levels.
 */

import type { IndicatorConfig } from './types.js';

export const DEFAULT_INDICATOR_CONFIG: IndicatorConfig = Object.freeze({
  emaShortPeriod: 9,
  emaLongPeriod: 21,
  rsiPeriod: 14,
  rsiOverbought: 70,
  rsiOversold: 30,
  atrPeriod: 14,
  supportResistanceLookback: 20,
  volumePeriod: 20,
});

/** Ratio above which the current bar counts as high volume. */
export const HIGH_VOLUME_RATIO = 1.5;

/** Cap applied to trend and crossover strengths. */
export const MAX_TREND_STRENGTH = 5.0;
