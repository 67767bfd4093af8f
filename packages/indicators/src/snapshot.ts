/**
 * @fileoverview Computes every indicator the factor analyzers need in one pass.
 */

import { IndicatorError, err, isIndicatorError, ok } from '@bullion/contracts';
import type { BarSeries, MarketBar, Result } from '@bullion/contracts';
import { atr } from './atr.js';
import { supportResistance } from './levels.js';
import { ema } from './moving-average.js';
import { rsi, rsiCondition } from './rsi.js';
import { currentValue } from './series.js';
import { detectCrossover, trendStrength } from './trend.js';
import type { IndicatorConfig, IndicatorSnapshot } from './types.js';
import { volumeProfile } from './volume.js';

const NUMERIC_COLUMNS = ['open', 'high', 'low', 'close', 'volume'] as const;

type NumericColumn = (typeof NUMERIC_COLUMNS)[number];

function column(bars: BarSeries, name: NumericColumn): number[] {
  return bars.map((bar: MarketBar, index) => {
    const value: unknown = bar[name];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new IndicatorError(`Column "${name}" is missing or non-numeric at index ${index}`, {
        indicator: 'snapshot',
        column: name,
        index,
      });
    }
    return value;
  });
}

/**
 * Runs the full indicator set over `bars`.
 *
 * Returns an error result instead of throwing when the series is empty,
 * a column is missing or non-numeric, or the series is too short for a
 * defined current RSI or ATR.
 *
 * @example
 * ```typescript
 * const result = computeSnapshot(bars, DEFAULT_INDICATOR_CONFIG);
 * if (!result.ok) {
 *   return errorSignal(result.error);
 * }
 * const { trend, crossover } = result.value;
 * ```
 */
export function computeSnapshot(
  bars: BarSeries,
  config: IndicatorConfig
): Result<IndicatorSnapshot, IndicatorError> {
  try {
    const lastBar = bars[bars.length - 1];
    if (!lastBar) {
      return err(
        new IndicatorError('Cannot compute indicators on an empty bar series', {
          indicator: 'snapshot',
          required: 1,
          received: 0,
        })
      );
    }

    const high = column(bars, 'high');
    const low = column(bars, 'low');
    const close = column(bars, 'close');
    const volume = column(bars, 'volume');
    column(bars, 'open');

    const emaShort = ema(close, config.emaShortPeriod);
    const emaLong = ema(close, config.emaLongPeriod);
    const rsiSeries = rsi(close, config.rsiPeriod);
    const atrSeries = atr(high, low, close, config.atrPeriod);

    return ok({
      emaShort,
      emaLong,
      rsi: rsiSeries,
      atr: atrSeries,
      currentAtr: currentValue('ATR', atrSeries),
      levels: supportResistance(high, low, close, config.supportResistanceLookback),
      volume: volumeProfile(volume, config.volumePeriod),
      trend: trendStrength(emaShort, emaLong),
      crossover: detectCrossover(emaShort, emaLong),
      rsiAnalysis: rsiCondition(rsiSeries, config.rsiOverbought, config.rsiOversold),
      currentPrice: lastBar.close,
      timestamp: lastBar.timestamp,
    });
  } catch (error) {
    if (isIndicatorError(error)) {
      return err(error);
    }
    throw error;
  }
}
