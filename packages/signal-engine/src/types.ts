/**
 * @fileoverview Signal engine types.
 */

import type { IndicatorConfig } from '@bullion/indicators';
import type { FactorJudgments } from '@bullion/contracts';

/**
 * Weight applied to each factor's strength in the composite vote.
 */
export interface FactorWeights {
  readonly trend: number;
  readonly rsi: number;
  readonly volume: number;
  readonly priceStructure: number;
}

export type FactorName = keyof FactorJudgments;

/**
 * Full engine configuration. Built once, frozen, and passed into every call.
 */
export interface SignalEngineConfig extends IndicatorConfig {
  readonly weights: FactorWeights;

  /** ATR multiple used as the stop distance */
  readonly stopLossAtrMultiplier: number;

  /** Take-profit distance as a multiple of the stop distance */
  readonly takeProfitRatio: number;

  /** Minimum winning score for a BUY or SELL to stand */
  readonly activationThreshold: number;
}

/**
 * Partial overrides accepted by mergeSignalConfig. Weights merge per field.
 */
export type SignalConfigOverrides = Partial<Omit<SignalEngineConfig, 'weights'>> & {
  readonly weights?: Partial<FactorWeights>;
};
