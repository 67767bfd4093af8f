/**
 * Relative Strength Index and its zone classification
 */

import { currentValue, requireLength, requirePeriod, rollingMean } from './series.js';
import type { IndicatorSeries, RsiAnalysis } from './types.js';

/**
 * RSI from simple rolling means of gains and losses.
 *
 * The first `period` positions are null. A window without losses
 * saturates at 100; a window without any change reads 50.
 *
 * @throws IndicatorError when the series has `period` points or fewer
 */
export function rsi(series: readonly number[], period: number): (number | null)[] {
  requirePeriod('RSI', period);
  requireLength('RSI', series, period + 1);

  const gains: number[] = [0];
  const losses: number[] = [0];
  for (let t = 1; t < series.length; t++) {
    const change = (series[t] ?? 0) - (series[t - 1] ?? 0);
    gains.push(change > 0 ? change : 0);
    losses.push(change < 0 ? -change : 0);
  }

  const meanGains = rollingMean(gains, period, period);
  const meanLosses = rollingMean(losses, period, period);

  return meanGains.map((meanGain, t) => {
    const meanLoss = meanLosses[t];
    if (meanGain === null || meanLoss === null || meanLoss === undefined) {
      return null;
    }
    if (meanLoss === 0) {
      return meanGain === 0 ? 50 : 100;
    }
    const rs = meanGain / meanLoss;
    return 100 - 100 / (1 + rs);
  });
}

/**
 * Classifies the current RSI reading.
 *
 * @param series - RSI series; its last value must be defined
 * @param overbought - Level at or above which the reading is OVERBOUGHT
 * @param oversold - Level at or below which the reading is OVERSOLD
 */
export function rsiCondition(series: IndicatorSeries, overbought: number, oversold: number): RsiAnalysis {
  const currentRsi = currentValue('RSI', series);
  const previousRsi = series.length >= 2 ? series[series.length - 2] : null;
  const momentum = previousRsi === null || previousRsi === undefined ? 0 : currentRsi - previousRsi;

  const isOverbought = currentRsi >= overbought;
  const isOversold = currentRsi <= oversold;

  if (isOverbought) {
    return { currentRsi, condition: 'OVERBOUGHT', signalBias: 'SELL', momentum, isOverbought, isOversold };
  }
  if (isOversold) {
    return { currentRsi, condition: 'OVERSOLD', signalBias: 'BUY', momentum, isOverbought, isOversold };
  }
  return { currentRsi, condition: 'NEUTRAL', signalBias: 'NEUTRAL', momentum, isOverbought, isOversold };
}
