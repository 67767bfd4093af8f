/**
 * @fileoverview Market data types.
 *
 * Provider-agnostic OHLCV bar and bar-series shapes. Pure data, no I/O.
 *
 * @module @bullion/contracts/market
 */

/**
 * A single OHLCV (Open, High, Low, Close, Volume) bar with timestamp.
 *
 * @invariant high >= max(open, close, low)
 * @invariant low <= min(open, close, high)
 * @invariant volume >= 0
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * const bar: MarketBar = {
 *   timestamp: '2025-01-15T14:30:00.000Z',
 *   open: 200.5,
 *   high: 201.25,
 *   low: 200.0,
 *   close: 201.0,
 *   volume: 15000
 * };
 * ```
 */
export interface MarketBar {
  /** ISO 8601 timestamp of bar open (UTC) */
  readonly timestamp: string;

  /** Opening price for the period */
  readonly open: number;

  /** Highest price during the period */
  readonly high: number;

  /** Lowest price during the period */
  readonly low: number;

  /** Closing price for the period */
  readonly close: number;

  /** Trading volume during the period */
  readonly volume: number;
}

/**
 * Ordered bar sequence with strictly increasing timestamps.
 * The last element is "now".
 */
export type BarSeries = readonly MarketBar[];

/**
 * Minimum number of bars a series must hold before it is analysed.
 */
export const MIN_ANALYSIS_BARS = 50;
