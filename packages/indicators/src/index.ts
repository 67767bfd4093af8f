/**
 * @bullion/indicators
 *
 * Pure technical indicators over OHLCV bar series
 *
 * Every function is deterministic and free of I/O. Series outputs stay
 * index-aligned with their inputs; warm-up positions are null.
 *
 * @packageDocumentation
 */

// Export types
export type {
  IndicatorSeries,
  IndicatorConfig,
  IndicatorSnapshot,
  SupportResistanceLevels,
  VolumeProfile,
  TrendAnalysis,
  CrossoverAnalysis,
  RsiAnalysis,
} from './types.js';

// Defaults
export { DEFAULT_INDICATOR_CONFIG, HIGH_VOLUME_RATIO, MAX_TREND_STRENGTH } from './config.js';

// Indicators
export { ema } from './moving-average.js';
export { rsi, rsiCondition } from './rsi.js';
export { atr, trueRange } from './atr.js';
export { supportResistance } from './levels.js';
export { volumeProfile } from './volume.js';
export { trendStrength, detectCrossover } from './trend.js';

// Snapshot
export { computeSnapshot } from './snapshot.js';
