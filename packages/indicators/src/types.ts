/**
 * Core type definitions for the indicators package
 * All types describe outputs of pure functions (no I/O, deterministic)
 */

import type { CrossoverType, RsiCondition, SignalDirection, TrendDirection } from '@bullion/contracts';

/**
 * A derived series aligned index-for-index with its source bars.
 * Positions inside the warm-up window are `null`.
 */
export type IndicatorSeries = readonly (number | null)[];

/**
 * Classical pivot levels over a trailing window
 */
export interface SupportResistanceLevels {
  /** 2 * pivot - recentHigh */
  support: number;

  /** 2 * pivot - recentLow */
  resistance: number;

  /** (recentHigh + recentLow + currentClose) / 3 */
  pivot: number;

  recentHigh: number;
  recentLow: number;
}

export interface VolumeProfile {
  currentVolume: number;

  /** Mean volume over the trailing window */
  averageVolume: number;

  /** currentVolume / averageVolume, 1.0 when the average is zero */
  volumeRatio: number;

  /** volumeRatio > 1.5 */
  isHighVolume: boolean;
}

/**
 * Trend reading from the separation of the two EMAs
 */
export interface TrendAnalysis {
  direction: TrendDirection;

  /** min(separationPercent / 2, 5), 0 when NEUTRAL */
  strength: number;

  /** |emaShort - emaLong| / emaLong * 100 */
  separationPercent: number;

  emaShort: number;
  emaLong: number;
}

/**
 * EMA crossover on the last step of the series
 */
export interface CrossoverAnalysis {
  crossover: CrossoverType;

  /** min(current separation %, 5), 0 when no crossover */
  strength: number;

  /** Absolute EMA distance now */
  currentSeparation: number;

  /** Absolute EMA distance one step earlier */
  previousSeparation: number;
}

export interface RsiAnalysis {
  currentRsi: number;
  condition: RsiCondition;

  /** Contrarian bias implied by the condition */
  signalBias: SignalDirection | 'NEUTRAL';

  /** currentRsi - previousRsi, 0 without a defined previous value */
  momentum: number;

  isOverbought: boolean;
  isOversold: boolean;
}

/**
 * Periods and levels the snapshot is computed with
 */
export interface IndicatorConfig {
  readonly emaShortPeriod: number;
  readonly emaLongPeriod: number;
  readonly rsiPeriod: number;
  readonly rsiOverbought: number;
  readonly rsiOversold: number;
  readonly atrPeriod: number;
  readonly supportResistanceLookback: number;
  readonly volumePeriod: number;
}

/**
 * Everything the factor analyzers read, computed fresh per call.
 * The last element of each series represents "now".
 */
export interface IndicatorSnapshot {
  readonly emaShort: readonly number[];
  readonly emaLong: readonly number[];
  readonly rsi: IndicatorSeries;
  readonly atr: IndicatorSeries;

  /** Last ATR value, always defined on a successful snapshot */
  readonly currentAtr: number;

  readonly levels: SupportResistanceLevels;
  readonly volume: VolumeProfile;
  readonly trend: TrendAnalysis;
  readonly crossover: CrossoverAnalysis;
  readonly rsiAnalysis: RsiAnalysis;

  /** Close of the last bar */
  readonly currentPrice: number;

  /** Timestamp of the last bar */
  readonly timestamp: string;
}
