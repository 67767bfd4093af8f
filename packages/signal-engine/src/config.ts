/**
 * @fileoverview Signal engine configuration defaults, merging and validation.
 *
 * The configuration is an immutable value: callers merge their overrides
 * once, validate, and pass the frozen result into generateSignal.
 */

import { ConfigurationError, err, ok } from '@bullion/contracts';
import type { Result } from '@bullion/contracts';
import { DEFAULT_INDICATOR_CONFIG } from '@bullion/indicators';
import { DEFAULT_WEIGHTS } from './scoring/weights.js';
import type { FactorWeights, SignalConfigOverrides, SignalEngineConfig } from './types.js';

/**
 * Default configuration values.
 */
export const DEFAULT_SIGNAL_CONFIG: SignalEngineConfig = Object.freeze({
  ...DEFAULT_INDICATOR_CONFIG,
  weights: DEFAULT_WEIGHTS,
  stopLossAtrMultiplier: 2.0,
  takeProfitRatio: 2.0,
  activationThreshold: 1.0,
});

/**
 * Merges overrides onto the defaults and freezes the result.
 *
 * @example
 * ```typescript
 * const config = mergeSignalConfig({ rsiPeriod: 10, weights: { volume: 0.1 } });
 * config.weights.trend; // 0.4
 * ```
 */
export function mergeSignalConfig(overrides: SignalConfigOverrides = {}): SignalEngineConfig {
  const weights: FactorWeights = Object.freeze({ ...DEFAULT_WEIGHTS, ...overrides.weights });

  return Object.freeze({
    ...DEFAULT_SIGNAL_CONFIG,
    ...overrides,
    weights,
  });
}

const PERIOD_KEYS = [
  'emaShortPeriod',
  'emaLongPeriod',
  'rsiPeriod',
  'atrPeriod',
  'supportResistanceLookback',
  'volumePeriod',
] as const;

const WEIGHT_KEYS = ['trend', 'rsi', 'volume', 'priceStructure'] as const;

/**
 * Checks a configuration for values the engine cannot work with.
 *
 * @returns The same configuration, or a ConfigurationError listing every issue
 */
export function validateSignalConfig(config: SignalEngineConfig): Result<SignalEngineConfig, ConfigurationError> {
  const issues: string[] = [];

  for (const key of PERIOD_KEYS) {
    const value = config[key];
    if (!Number.isInteger(value) || value < 1) {
      issues.push(`${key}: must be a positive integer (received ${value})`);
    }
  }

  if (config.rsiOversold < 0 || config.rsiOverbought > 100) {
    issues.push('rsiOversold/rsiOverbought: must lie within 0-100');
  }
  if (config.rsiOversold >= config.rsiOverbought) {
    issues.push(
      `rsiOversold: must be below rsiOverbought (${config.rsiOversold} >= ${config.rsiOverbought})`
    );
  }

  for (const key of WEIGHT_KEYS) {
    const value = config.weights[key];
    if (!Number.isFinite(value) || value < 0) {
      issues.push(`weights.${key}: must be a non-negative number (received ${value})`);
    }
  }

  if (!(config.stopLossAtrMultiplier > 0)) {
    issues.push(`stopLossAtrMultiplier: must be positive (received ${config.stopLossAtrMultiplier})`);
  }
  if (!(config.takeProfitRatio > 0)) {
    issues.push(`takeProfitRatio: must be positive (received ${config.takeProfitRatio})`);
  }
  if (!(config.activationThreshold > 0)) {
    issues.push(`activationThreshold: must be positive (received ${config.activationThreshold})`);
  }

  if (issues.length > 0) {
    return err(new ConfigurationError(`Invalid signal configuration: ${issues.join('; ')}`, { issues }));
  }

  return ok(config);
}
