/**
 * @fileoverview Indicator labels, factor judgments and the composite signal record.
 *
 * These are the shapes that flow from the indicator engine through the factor
 * analyzers to the composer and on to the display layer. All of them are
 * value data created fresh for each analysis call.
 *
 * @module @bullion/contracts/signals
 */

/** Tradeable direction produced by a composite decision. */
export type SignalDirection = 'BUY' | 'SELL' | 'HOLD';

/** Direction a single factor may report; NEUTRAL factors never vote. */
export type FactorDirection = SignalDirection | 'NEUTRAL';

/** Direction carried by a composite signal record. */
export type CompositeDirection = SignalDirection | 'ERROR';

/** EMA-relative trend direction. */
export type TrendDirection = 'BULLISH' | 'BEARISH' | 'NEUTRAL';

/** EMA crossover event on the latest bar. */
export type CrossoverType = 'BULLISH' | 'BEARISH' | 'NONE';

/** RSI zone classification. */
export type RsiCondition = 'OVERBOUGHT' | 'OVERSOLD' | 'NEUTRAL';

export const SIGNAL_DIRECTIONS: readonly SignalDirection[] = ['BUY', 'SELL', 'HOLD'];

/**
 * Judgment emitted by one factor analyzer.
 */
export interface FactorJudgment<D extends FactorDirection = FactorDirection> {
  /** Direction the factor argues for */
  readonly direction: D;
  /** Magnitude of the argument; volume may be negative as a penalty */
  readonly strength: number;
  /** Human-readable explanation, never empty */
  readonly reasons: readonly string[];
}

export interface TrendJudgment extends FactorJudgment<SignalDirection> {
  readonly crossoverType: CrossoverType;
  readonly trendDirection: TrendDirection;
  readonly trendStrength: number;
}

export interface RsiJudgment extends FactorJudgment<SignalDirection> {
  readonly currentRsi: number;
  readonly condition: RsiCondition;
  readonly momentum: number;
}

export interface VolumeJudgment extends FactorJudgment<'NEUTRAL'> {
  readonly volumeRatio: number;
  readonly isHighVolume: boolean;
}

export interface PriceStructureJudgment extends FactorJudgment<SignalDirection> {
  readonly supportLevel: number;
  readonly resistanceLevel: number;
  readonly trendDirection: TrendDirection;
}

/**
 * The four factor judgments feeding the composite vote.
 */
export interface FactorJudgments {
  readonly trend: TrendJudgment;
  readonly rsi: RsiJudgment;
  readonly volume: VolumeJudgment;
  readonly priceStructure: PriceStructureJudgment;
}

/**
 * Stop-loss and take-profit levels with derived risk metrics.
 * All values are rounded to two decimals.
 */
export interface RiskLevels {
  readonly stopLoss: number;
  readonly takeProfit: number;
  readonly riskAmount: number;
  readonly rewardAmount: number;
  /** rewardAmount / riskAmount, or 0 when there is no risk distance */
  readonly riskRewardRatio: number;
  readonly atrValue: number;
}

/**
 * Summary of the market state behind a signal.
 */
export interface MarketContext {
  readonly trendDirection: TrendDirection;
  readonly trendStrength: number;
  readonly rsiCondition: RsiCondition;
  readonly volumeStatus: 'HIGH' | 'NORMAL';
  readonly supportLevel: number;
  readonly resistanceLevel: number;
}

/** Accumulated weighted strength per direction. */
export type DirectionScores = Readonly<Record<SignalDirection, number>>;

/**
 * A successful composite decision.
 */
export interface TradeSignal {
  readonly direction: SignalDirection;
  /** Timestamp of the last analysed bar */
  readonly timestamp: string;
  /** Close of the last analysed bar */
  readonly currentPrice: number;
  readonly strength: number;
  /** 0-10 */
  readonly confidence: number;
  /** 0-1, share of directional factors agreeing */
  readonly consensus: number;
  readonly scores: DirectionScores;
  readonly components: FactorJudgments;
  readonly risk: RiskLevels;
  readonly marketContext: MarketContext;
  readonly recommendation: string;
}

/**
 * Signal emitted when analysis could not complete.
 */
export interface ErrorSignal {
  readonly direction: 'ERROR';
  /** Timestamp of the last supplied bar, or null when none was supplied */
  readonly timestamp: string | null;
  readonly error: string;
  readonly code: string;
  readonly recommendation: string;
}

/**
 * Terminal output of the signal core.
 */
export type CompositeSignal = TradeSignal | ErrorSignal;

export function isErrorSignal(signal: CompositeSignal): signal is ErrorSignal {
  return signal.direction === 'ERROR';
}

export function isTradeSignal(signal: CompositeSignal): signal is TradeSignal {
  return signal.direction !== 'ERROR';
}
