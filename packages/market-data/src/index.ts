/**
 * @fileoverview Main entry point for @bullion/market-data.
 *
 * Alpha Vantage, Yahoo Finance and demo data providers behind a fallback
 * chain that only hands out validated bar series.
 *
 * @module @bullion/market-data
 */

export { CompositeMarketDataSource, createMarketDataSource } from './composite.js';
export type { CompositeMarketDataOptions, MarketDataSourceSettings } from './composite.js';

export { AlphaVantageProvider, parseIntradaySeries, clipToLookback } from './providers/alpha-vantage.js';
export type { AlphaVantageProviderOptions } from './providers/alpha-vantage.js';
export { YahooFinanceProvider, parseChartResponse } from './providers/yahoo.js';
export type { YahooFinanceProviderOptions, YahooChartResponse } from './providers/yahoo.js';
export {
  DemoDataProvider,
  generateDemoBars,
  DEMO_BASE_PRICE,
  DEMO_BAR_COUNT,
  DEMO_SEED,
  DEMO_SCENARIOS,
} from './providers/demo.js';
export type { DemoDataOptions, DemoDataProviderOptions, DemoScenario } from './providers/demo.js';

export { RateLimiter, ALPHA_VANTAGE_MIN_INTERVAL_MS } from './rate-limiter.js';
export type { RateLimiterOptions } from './rate-limiter.js';

export type { MarketDataProvider, MarketDataResult, ProviderAttempt, ClockFn, SleepFn } from './types.js';
