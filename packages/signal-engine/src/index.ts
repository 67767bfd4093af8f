/**
 * @fileoverview Main entry point for @bullion/signal-engine.
 *
 * Turns a validated bar series into a composite BUY/SELL/HOLD signal with
 * per-factor judgments and stop-loss/take-profit levels.
 */

// Main function
export { generateSignal, createErrorSignal } from './generate.js';

// Configuration
export { DEFAULT_SIGNAL_CONFIG, mergeSignalConfig, validateSignalConfig } from './config.js';
export type { SignalEngineConfig, SignalConfigOverrides, FactorWeights, FactorName } from './types.js';

// Analyzers
export { analyzeTrend, analyzeRsi, analyzeVolume, analyzePriceStructure, analyzeFactors } from './analyzers/index.js';

// Scoring
export { DEFAULT_WEIGHTS } from './scoring/weights.js';
export { composeDecision, scoreDirections, calculateConsensus } from './scoring/composer.js';
export type { CompositeDecision } from './scoring/composer.js';

// Risk
export { calculateRiskLevels, roundPrice } from './risk/risk-levels.js';
export type { RiskInput, RiskParameters } from './risk/risk-levels.js';

export { buildRecommendation, ERROR_RECOMMENDATION } from './recommendation.js';
export { buildMarketContext } from './context.js';
