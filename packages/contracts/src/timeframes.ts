/**
 * @fileoverview Chart timeframes offered to users and their candle mappings.
 *
 * A chart timeframe names the window shown to the user ("1d" = one day of
 * data); each maps to a candle interval and to the interval/range codes the
 * market-data providers understand.
 *
 * @module @bullion/contracts/timeframes
 */

import { ConfigurationError } from './errors.js';

/**
 * Supported chart windows.
 */
export enum ChartTimeframe {
  /** One day of 5-minute candles */
  OneDay = '1d',
  /** Two days of 15-minute candles */
  TwoDay = '2d',
  /** Five days of 30-minute candles */
  FiveDay = '5d',
}

/**
 * Provider-facing description of a chart timeframe.
 */
export interface TimeframeSpec {
  /** Candle width in minutes */
  candleMinutes: number;
  /** Days of history the chart covers */
  lookbackDays: number;
  /** Yahoo chart API interval code */
  yahooInterval: string;
  /** Yahoo chart API range code */
  yahooRange: string;
  /** Alpha Vantage intraday interval code */
  alphaVantageInterval: string;
  /** Display label */
  description: string;
}

export const TIMEFRAME_SPECS: Readonly<Record<ChartTimeframe, TimeframeSpec>> = {
  [ChartTimeframe.OneDay]: {
    candleMinutes: 5,
    lookbackDays: 1,
    yahooInterval: '5m',
    yahooRange: '1d',
    alphaVantageInterval: '5min',
    description: '1-day chart with 5-minute candles',
  },
  [ChartTimeframe.TwoDay]: {
    candleMinutes: 15,
    lookbackDays: 2,
    yahooInterval: '15m',
    yahooRange: '2d',
    alphaVantageInterval: '15min',
    description: '2-day chart with 15-minute candles',
  },
  [ChartTimeframe.FiveDay]: {
    candleMinutes: 30,
    lookbackDays: 5,
    yahooInterval: '30m',
    yahooRange: '5d',
    alphaVantageInterval: '30min',
    description: '5-day (weekly) chart with 30-minute candles',
  },
};

/**
 * Validates whether a string names a chart timeframe.
 *
 * @example
 * ```typescript
 * isChartTimeframe('2d') // true
 * isChartTimeframe('1w') // false
 * ```
 */
export function isChartTimeframe(value: string): value is ChartTimeframe {
  return getAllChartTimeframes().some((timeframe) => timeframe === value);
}

/**
 * Parses a user-supplied timeframe string.
 *
 * @throws {ConfigurationError} If the value is not a supported timeframe
 */
export function parseChartTimeframe(value: string): ChartTimeframe {
  const normalized = value.trim().toLowerCase();
  if (!isChartTimeframe(normalized)) {
    throw new ConfigurationError(
      `Unsupported timeframe "${value}". Use one of: ${getAllChartTimeframes().join(', ')}`,
      { value }
    );
  }
  return normalized;
}

export function getAllChartTimeframes(): ChartTimeframe[] {
  return [ChartTimeframe.OneDay, ChartTimeframe.TwoDay, ChartTimeframe.FiveDay];
}

export function describeTimeframe(timeframe: ChartTimeframe): string {
  return TIMEFRAME_SPECS[timeframe].description;
}
