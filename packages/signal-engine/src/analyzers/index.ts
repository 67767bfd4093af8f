/**
 * @fileoverview Factor analyzers exports.
 */

import type { IndicatorSnapshot } from '@bullion/indicators';
import type { FactorJudgments } from '@bullion/contracts';
import type { SignalEngineConfig } from '../types.js';
import { analyzePriceStructure } from './price-structure.js';
import { analyzeRsi } from './rsi.js';
import { analyzeTrend } from './trend.js';
import { analyzeVolume } from './volume.js';

export { analyzeTrend, analyzeRsi, analyzeVolume, analyzePriceStructure };

/**
 * Runs all four analyzers over one snapshot.
 */
export function analyzeFactors(snapshot: IndicatorSnapshot, config: SignalEngineConfig): FactorJudgments {
  return {
    trend: analyzeTrend(snapshot, config),
    rsi: analyzeRsi(snapshot, config),
    volume: analyzeVolume(snapshot),
    priceStructure: analyzePriceStructure(snapshot),
  };
}
