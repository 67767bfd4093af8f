/**
 * Configuration loading and management
 */

import { ConfigurationError } from '@bullion/contracts';
import type { Logger } from '@bullion/logger';
import { mergeSignalConfig, validateSignalConfig, type SignalConfigOverrides, type SignalEngineConfig } from '@bullion/signal-engine';
import { configSchema, envMapping, type Config } from './schema.js';

interface RawConfig {
  [key: string]: string | RawConfig;
}

/**
 * Load configuration from environment and defaults
 *
 * @throws {ConfigurationError} Listing every invalid setting as `path: message`
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, value);
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Configuration validation failed: ${issues.join('; ')}`, { issues });
  }

  if (logger) {
    logger.info('Configuration loaded', getConfigSummary(result.data));
  }

  return result.data;
}

/**
 * Set nested property in object
 */
function setNestedProperty(obj: RawConfig, path: string, value: string): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = obj;
  for (const key of keys) {
    const next = current[key];
    if (typeof next === 'object') {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/**
 * Builds the immutable signal engine configuration from the `signal` section.
 *
 * @throws {ConfigurationError} When the merged values are inconsistent
 */
export function buildSignalConfig(config: Config): SignalEngineConfig {
  const { signal } = config;

  // Only defined keys, so engine defaults survive the merge
  const overrides: SignalConfigOverrides = {
    ...(signal.emaShortPeriod === undefined ? {} : { emaShortPeriod: signal.emaShortPeriod }),
    ...(signal.emaLongPeriod === undefined ? {} : { emaLongPeriod: signal.emaLongPeriod }),
    ...(signal.rsiPeriod === undefined ? {} : { rsiPeriod: signal.rsiPeriod }),
    ...(signal.rsiOverbought === undefined ? {} : { rsiOverbought: signal.rsiOverbought }),
    ...(signal.rsiOversold === undefined ? {} : { rsiOversold: signal.rsiOversold }),
    ...(signal.stopLossAtrMultiplier === undefined ? {} : { stopLossAtrMultiplier: signal.stopLossAtrMultiplier }),
    ...(signal.takeProfitRatio === undefined ? {} : { takeProfitRatio: signal.takeProfitRatio }),
  };

  const validated = validateSignalConfig(mergeSignalConfig(overrides));
  if (!validated.ok) {
    throw validated.error;
  }
  return validated.value;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    symbol: config.app.symbol,
    demoMode: config.app.demoMode,
    tradingMode: config.trading.mode,
    providers: {
      alphaVantage: config.provider.alphaVantageApiKey ? 'configured' : 'not configured',
      minRequestIntervalMs: config.provider.minRequestIntervalMs,
    },
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
  };
}

// Re-export types
export type { Config } from './schema.js';
export { configSchema, envMapping } from './schema.js';
