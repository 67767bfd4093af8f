/**
 * @fileoverview Signal generation orchestrator.
 *
 * bars -> indicator snapshot -> four factor judgments -> weighted vote ->
 * risk levels -> composite signal. Pure and synchronous.
 */

import { SignalError, describeError, isBullionError } from '@bullion/contracts';
import type { BarSeries, CompositeSignal, ErrorSignal, TradeSignal } from '@bullion/contracts';
import { computeSnapshot } from '@bullion/indicators';
import { analyzeFactors } from './analyzers/index.js';
import { DEFAULT_SIGNAL_CONFIG } from './config.js';
import { buildMarketContext } from './context.js';
import { ERROR_RECOMMENDATION, buildRecommendation } from './recommendation.js';
import { calculateRiskLevels } from './risk/risk-levels.js';
import { composeDecision } from './scoring/composer.js';
import type { SignalEngineConfig } from './types.js';

/**
 * Builds the ERROR variant for a failed analysis.
 */
export function createErrorSignal(error: SignalError, bars: BarSeries): ErrorSignal {
  return {
    direction: 'ERROR',
    timestamp: bars[bars.length - 1]?.timestamp ?? null,
    error: error.message,
    code: error.code,
    recommendation: ERROR_RECOMMENDATION,
  };
}

function buildSignal(bars: BarSeries, config: SignalEngineConfig): CompositeSignal {
  const snapshot = computeSnapshot(bars, config);
  if (!snapshot.ok) {
    const cause = snapshot.error;
    return createErrorSignal(
      new SignalError(`Failed to calculate indicators: ${cause.message}`, { ...cause.data, cause: cause.code }),
      bars
    );
  }

  const { value } = snapshot;
  const components = analyzeFactors(value, config);
  const decision = composeDecision(components, config.weights, config.activationThreshold);

  const risk = calculateRiskLevels(
    decision.direction,
    {
      currentPrice: value.currentPrice,
      atr: value.currentAtr,
      support: value.levels.support,
      resistance: value.levels.resistance,
    },
    config
  );

  const signal: TradeSignal = {
    direction: decision.direction,
    timestamp: value.timestamp,
    currentPrice: value.currentPrice,
    strength: decision.strength,
    confidence: decision.confidence,
    consensus: decision.consensus,
    scores: decision.scores,
    components,
    risk,
    marketContext: buildMarketContext(value),
    recommendation: buildRecommendation(decision.direction, decision.confidence),
  };

  return signal;
}

/**
 * Generates a composite trading signal from a validated bar series.
 *
 * Never throws: indicator failures and unexpected faults both come back as
 * an ERROR signal carrying the cause.
 *
 * @param bars - Validated bar series, oldest first
 * @param config - Engine configuration (defaults when omitted)
 *
 * @example
 * ```typescript
 * const signal = generateSignal(bars, mergeSignalConfig({ rsiPeriod: 10 }));
 * if (signal.direction !== 'ERROR') {
 *   console.log(signal.recommendation, signal.risk.stopLoss);
 * }
 * ```
 */
export function generateSignal(bars: BarSeries, config: SignalEngineConfig = DEFAULT_SIGNAL_CONFIG): CompositeSignal {
  try {
    return buildSignal(bars, config);
  } catch (error) {
    const cause = isBullionError(error) ? error.code : 'UNEXPECTED';
    return createErrorSignal(new SignalError(`Signal generation failed: ${describeError(error)}`, { cause }), bars);
  }
}
