/**
 * @fileoverview Default factor weights.
 */

import type { FactorWeights } from '../types.js';

/**
 * Default weights for the composite vote.
 */
export const DEFAULT_WEIGHTS: FactorWeights = Object.freeze({
  trend: 0.4,
  rsi: 0.3,
  volume: 0.2,
  priceStructure: 0.1,
});
