/**
 * @fileoverview Main entry point for @bullion/contracts.
 *
 * Exports the bar model, signal record types, error taxonomy and the
 * `Result` type shared by every package in the suite.
 *
 * @module @bullion/contracts
 */

// Market data types
export type { MarketBar, BarSeries } from './market.js';
export { MIN_ANALYSIS_BARS } from './market.js';
export { validateBarSeries, checkBar } from './bar-series.js';

// Chart timeframes
export {
  ChartTimeframe,
  TIMEFRAME_SPECS,
  isChartTimeframe,
  parseChartTimeframe,
  getAllChartTimeframes,
  describeTimeframe,
} from './timeframes.js';
export type { TimeframeSpec } from './timeframes.js';

// Signal types
export type {
  SignalDirection,
  FactorDirection,
  CompositeDirection,
  TrendDirection,
  CrossoverType,
  RsiCondition,
  FactorJudgment,
  TrendJudgment,
  RsiJudgment,
  VolumeJudgment,
  PriceStructureJudgment,
  FactorJudgments,
  RiskLevels,
  MarketContext,
  DirectionScores,
  TradeSignal,
  ErrorSignal,
  CompositeSignal,
} from './signals.js';
export { SIGNAL_DIRECTIONS, isErrorSignal, isTradeSignal } from './signals.js';

// Result type
export type { Result, Ok, Err } from './result.js';
export { ok, err } from './result.js';

// Error classes and guards
export {
  BullionError,
  IndicatorError,
  SignalError,
  InvalidBarSeriesError,
  ProviderError,
  ProviderRateLimitError,
  ConfigurationError,
  isBullionError,
  isIndicatorError,
  isInvalidBarSeriesError,
  isProviderError,
  isProviderRateLimitError,
  describeError,
} from './errors.js';
