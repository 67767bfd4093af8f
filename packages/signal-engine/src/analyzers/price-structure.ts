/**
 * @fileoverview Price position relative to pivot support and resistance.
 */

import type { IndicatorSnapshot } from '@bullion/indicators';
import type { PriceStructureJudgment } from '@bullion/contracts';

/** Within 1% above support counts as "near support". */
const SUPPORT_PROXIMITY = 1.01;

/** Within 1% below resistance counts as "near resistance". */
const RESISTANCE_PROXIMITY = 0.99;

const LEVEL_STRENGTH = 2.0;

/** Trend strength above which a trend note is appended. */
const TREND_NOTE_THRESHOLD = 3.0;

export function analyzePriceStructure(snapshot: IndicatorSnapshot): PriceStructureJudgment {
  const { currentPrice, levels, trend } = snapshot;
  const { support, resistance } = levels;

  const detail = {
    supportLevel: support,
    resistanceLevel: resistance,
    trendDirection: trend.direction,
  };

  const trendNote = trend.strength > TREND_NOTE_THRESHOLD ? [`Strong ${trend.direction.toLowerCase()} trend`] : [];

  if (currentPrice <= support * SUPPORT_PROXIMITY) {
    return {
      ...detail,
      direction: 'BUY',
      strength: LEVEL_STRENGTH,
      reasons: [`Price near support level ($${support.toFixed(2)})`, ...trendNote],
    };
  }
  if (currentPrice >= resistance * RESISTANCE_PROXIMITY) {
    return {
      ...detail,
      direction: 'SELL',
      strength: LEVEL_STRENGTH,
      reasons: [`Price near resistance level ($${resistance.toFixed(2)})`, ...trendNote],
    };
  }

  return {
    ...detail,
    direction: 'HOLD',
    strength: 0,
    reasons: [`Price between support ($${support.toFixed(2)}) and resistance ($${resistance.toFixed(2)})`, ...trendNote],
  };
}
