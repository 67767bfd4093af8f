/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

// Environment values arrive as strings; only numeric and boolean fields convert them
const positiveNumber = z.coerce.number().positive();
const envBoolean = z.preprocess(
  (value) => (value === 'true' ? true : value === 'false' ? false : value),
  z.boolean()
);

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'staging', 'production', 'test']).default('development'),
      demoMode: envBoolean.default(false),
      symbol: z.string().min(1).default('GLD'),
      name: z.string().default('Bullion Signals'),
      version: z.string().default('0.1.0'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),

  provider: z
    .object({
      alphaVantageApiKey: z.string().optional(),
      timeoutMs: positiveNumber.default(30000),
      minRequestIntervalMs: z.coerce.number().nonnegative().default(12000),
    })
    .default({}),

  risk: z
    .object({
      defaultRiskPercent: positiveNumber.max(100).default(2.0),
      maxPositionSize: positiveNumber.default(10000),
    })
    .default({}),

  trading: z
    .object({
      mode: z.enum(['BACKTEST', 'REALTIME']).default('BACKTEST'),
    })
    .default({}),

  // Unset values fall back to the signal engine defaults
  signal: z
    .object({
      emaShortPeriod: z.coerce.number().int().positive().optional(),
      emaLongPeriod: z.coerce.number().int().positive().optional(),
      rsiPeriod: z.coerce.number().int().positive().optional(),
      rsiOverbought: z.coerce.number().min(0).max(100).optional(),
      rsiOversold: z.coerce.number().min(0).max(100).optional(),
      stopLossAtrMultiplier: positiveNumber.optional(),
      takeProfitRatio: positiveNumber.optional(),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  NODE_ENV: 'app.env',
  DEMO_MODE: 'app.demoMode',
  DEFAULT_SYMBOL: 'app.symbol',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  ALPHA_VANTAGE_API_KEY: 'provider.alphaVantageApiKey',
  PROVIDER_TIMEOUT_MS: 'provider.timeoutMs',
  PROVIDER_MIN_INTERVAL_MS: 'provider.minRequestIntervalMs',
  DEFAULT_RISK_PERCENT: 'risk.defaultRiskPercent',
  MAX_POSITION_SIZE: 'risk.maxPositionSize',
  TRADING_MODE: 'trading.mode',
  EMA_SHORT_PERIOD: 'signal.emaShortPeriod',
  EMA_LONG_PERIOD: 'signal.emaLongPeriod',
  RSI_PERIOD: 'signal.rsiPeriod',
  RSI_OVERBOUGHT: 'signal.rsiOverbought',
  RSI_OVERSOLD: 'signal.rsiOversold',
  STOP_LOSS_ATR_MULTIPLIER: 'signal.stopLossAtrMultiplier',
  TAKE_PROFIT_RATIO: 'signal.takeProfitRatio',
};
