/**
 * @fileoverview Type definitions for market data providers.
 *
 * @module @bullion/market-data/types
 */

import type { BarSeries, ChartTimeframe, MarketBar } from '@bullion/contracts';

/**
 * A source of OHLCV bars for one symbol and chart timeframe.
 *
 * Implementations return bars in ascending timestamp order and throw
 * `ProviderError` (or `ProviderRateLimitError`) when they cannot deliver.
 */
export interface MarketDataProvider {
  readonly id: string;
  getBars(symbol: string, timeframe: ChartTimeframe): Promise<MarketBar[]>;
}

/**
 * One failed attempt recorded by the composite source.
 */
export interface ProviderAttempt {
  provider: string;
  error: string;
}

/**
 * Bars delivered by the composite source, with the provider that served them.
 */
export interface MarketDataResult {
  provider: string;
  symbol: string;
  timeframe: ChartTimeframe;
  bars: BarSeries;
  attempts: ProviderAttempt[];
}

/**
 * Sleep function, injectable so tests never wait on a real timer.
 */
export type SleepFn = (ms: number) => Promise<void>;

/**
 * Clock function returning epoch milliseconds.
 */
export type ClockFn = () => number;
