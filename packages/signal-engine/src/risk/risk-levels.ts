/**
 * @fileoverview Stop-loss and take-profit levels from ATR and pivots.
 */

import type { RiskLevels, SignalDirection } from '@bullion/contracts';

/** Long stops sit just below support. */
const SUPPORT_BUFFER = 0.99;

/** Short stops sit just above resistance. */
const RESISTANCE_BUFFER = 1.01;

export interface RiskInput {
  currentPrice: number;
  atr: number;
  support: number;
  resistance: number;
}

export interface RiskParameters {
  stopLossAtrMultiplier: number;
  takeProfitRatio: number;
}

/**
 * Round to 2 decimals.
 */
export function roundPrice(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Derives risk levels for the final direction.
 *
 * BUY stops at the tighter of the ATR stop and just below support; SELL at
 * the tighter of the ATR stop and just above resistance. HOLD brackets the
 * price symmetrically by one stop distance.
 */
export function calculateRiskLevels(
  direction: SignalDirection,
  input: RiskInput,
  params: RiskParameters
): RiskLevels {
  const { currentPrice, atr, support, resistance } = input;
  const stopDistance = atr * params.stopLossAtrMultiplier;

  let stopLoss: number;
  let takeProfit: number;

  if (direction === 'BUY') {
    stopLoss = Math.max(currentPrice - stopDistance, support * SUPPORT_BUFFER);
    takeProfit = currentPrice + stopDistance * params.takeProfitRatio;
  } else if (direction === 'SELL') {
    stopLoss = Math.min(currentPrice + stopDistance, resistance * RESISTANCE_BUFFER);
    takeProfit = currentPrice - stopDistance * params.takeProfitRatio;
  } else {
    stopLoss = currentPrice - stopDistance;
    takeProfit = currentPrice + stopDistance;
  }

  const riskAmount = Math.abs(currentPrice - stopLoss);
  const rewardAmount = Math.abs(takeProfit - currentPrice);
  const riskRewardRatio = riskAmount > 0 ? rewardAmount / riskAmount : 0;

  return {
    stopLoss: roundPrice(stopLoss),
    takeProfit: roundPrice(takeProfit),
    riskAmount: roundPrice(riskAmount),
    rewardAmount: roundPrice(rewardAmount),
    riskRewardRatio: roundPrice(riskRewardRatio),
    atrValue: roundPrice(atr),
  };
}
