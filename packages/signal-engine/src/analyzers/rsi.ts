import type { IndicatorSnapshot } from '@bullion/indicators';
import type { RsiJudgment } from '@bullion/contracts';
import type { SignalEngineConfig } from '../types.js';

const MOMENTUM_TRIGGER = 5;
const MOMENTUM_BUY_CEILING = 60;
const MOMENTUM_SELL_FLOOR = 40;
const MAX_MOMENTUM_STRENGTH = 2.0;

/**
 * Contrarian RSI reading: oversold argues BUY, overbought argues SELL.
 * Inside the neutral band a momentum swing of more than 5 points leans
 * with the swing, unless the RSI is already past 60 (up) or 40 (down).
 */
export function analyzeRsi(snapshot: IndicatorSnapshot, config: SignalEngineConfig): RsiJudgment {
  const { currentRsi, condition, momentum, isOversold, isOverbought } = snapshot.rsiAnalysis;
  const detail = { currentRsi, condition, momentum };
  const reading = currentRsi.toFixed(1);

  if (isOversold) {
    return {
      ...detail,
      direction: 'BUY',
      strength: (config.rsiOversold - currentRsi) / 10,
      reasons: [`RSI oversold at ${reading}`],
    };
  }
  if (isOverbought) {
    return {
      ...detail,
      direction: 'SELL',
      strength: (currentRsi - config.rsiOverbought) / 10,
      reasons: [`RSI overbought at ${reading}`],
    };
  }

  if (momentum > MOMENTUM_TRIGGER && currentRsi < MOMENTUM_BUY_CEILING) {
    return {
      ...detail,
      direction: 'BUY',
      strength: Math.min(momentum / 10, MAX_MOMENTUM_STRENGTH),
      reasons: [`Strong RSI momentum (+${momentum.toFixed(1)})`],
    };
  }
  if (momentum < -MOMENTUM_TRIGGER && currentRsi > MOMENTUM_SELL_FLOOR) {
    return {
      ...detail,
      direction: 'SELL',
      strength: Math.min(Math.abs(momentum) / 10, MAX_MOMENTUM_STRENGTH),
      reasons: [`Negative RSI momentum (${momentum.toFixed(1)})`],
    };
  }

  return { ...detail, direction: 'HOLD', strength: 0, reasons: [`RSI neutral at ${reading}`] };
}
