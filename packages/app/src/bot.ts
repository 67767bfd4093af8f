/**
 * @fileoverview GoldSignalBot: fetches bars, runs the signal engine and keeps
 * the session log. Every method resolves; failures come back as null results
 * and are logged.
 */

import {
  ChartTimeframe,
  describeError,
  describeTimeframe,
  getAllChartTimeframes,
  isErrorSignal,
  type SignalDirection,
  type TradeSignal,
} from '@bullion/contracts';
import { createChildLogger, measureAsync, measureSync, type Logger } from '@bullion/logger';
import type { ClockFn, MarketDataResult, SleepFn } from '@bullion/market-data';
import { generateSignal, type SignalEngineConfig } from '@bullion/signal-engine';
import { SessionLog, type SessionSummary } from './session-log.js';

/**
 * Anything that hands out validated bars, usually a CompositeMarketDataSource.
 */
export interface BarSource {
  getBars(symbol: string, timeframe: ChartTimeframe): Promise<MarketDataResult>;
}

export interface GoldSignalBotOptions {
  marketData: BarSource;
  signalConfig: SignalEngineConfig;
  symbol: string;
  logger: Logger;
  now?: ClockFn;
  sleep?: SleepFn;
}

export interface TimeframeConsensus {
  label: string;
  direction: SignalDirection | null;
  count: number;
  total: number;
}

export interface MultiTimeframeResult {
  results: Record<ChartTimeframe, TradeSignal | null>;
  consensus: TimeframeConsensus;
}

export interface PerformanceMetrics {
  signalStrength: number;
  confidenceScore: number;
  riskRewardRatio: number;
  potentialRisk: number;
  potentialReward: number;
}

export type BacktestReport =
  | {
      mode: 'BACKTEST';
      timeframe: ChartTimeframe;
      status: 'COMPLETED';
      result: TradeSignal;
      performanceMetrics: PerformanceMetrics;
    }
  | {
      mode: 'BACKTEST';
      timeframe: ChartTimeframe;
      status: 'FAILED';
    };

export interface RealtimeOptions {
  iterations?: number;
  /** Pause between iterations */
  intervalMs?: number;
  onIteration?: (iteration: number, signal: TradeSignal | null) => void;
}

/**
 * Majority vote across timeframes. A direction needs strictly more votes
 * than each of the other two.
 *
 * @example
 * ```typescript
 * calculateTimeframeConsensus(['BUY', 'BUY', 'HOLD']).label; // 'BUY CONSENSUS (2/3)'
 * ```
 */
export function calculateTimeframeConsensus(signals: readonly SignalDirection[]): TimeframeConsensus {
  const total = signals.length;
  if (total === 0) {
    return { label: 'NO DATA', direction: null, count: 0, total };
  }

  const count = (direction: SignalDirection) => signals.filter((signal) => signal === direction).length;
  const buy = count('BUY');
  const sell = count('SELL');
  const hold = count('HOLD');

  if (buy > sell && buy > hold) {
    return { label: `BUY CONSENSUS (${buy}/${total})`, direction: 'BUY', count: buy, total };
  }
  if (sell > buy && sell > hold) {
    return { label: `SELL CONSENSUS (${sell}/${total})`, direction: 'SELL', count: sell, total };
  }
  return { label: 'MIXED/HOLD', direction: 'HOLD', count: hold, total };
}

export function calculatePerformanceMetrics(signal: TradeSignal): PerformanceMetrics {
  return {
    signalStrength: signal.strength,
    confidenceScore: signal.confidence,
    riskRewardRatio: signal.risk.riskRewardRatio,
    potentialRisk: signal.risk.riskAmount,
    potentialReward: signal.risk.rewardAmount,
  };
}

const defaultSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class GoldSignalBot {
  private readonly marketData: BarSource;
  private readonly signalConfig: SignalEngineConfig;
  private readonly symbol: string;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly sessionLog: SessionLog;

  constructor(options: GoldSignalBotOptions) {
    this.marketData = options.marketData;
    this.signalConfig = options.signalConfig;
    this.symbol = options.symbol;
    this.logger = createChildLogger(options.logger, { component: 'bot', symbol: options.symbol });
    this.sleep = options.sleep ?? defaultSleep;
    this.sessionLog = new SessionLog(options.now);
  }

  /**
   * Fetch, analyse and record one timeframe.
   *
   * @returns The trade signal, or null when no data could be fetched or the
   * engine produced an ERROR signal
   */
  async runSingleAnalysis(timeframe: ChartTimeframe = ChartTimeframe.OneDay): Promise<TradeSignal | null> {
    const log = createChildLogger(this.logger, { timeframe });
    log.info('Starting analysis', { description: describeTimeframe(timeframe) });

    let data: MarketDataResult;
    let fetchMs: number;
    try {
      const fetched = await measureAsync(() => this.marketData.getBars(this.symbol, timeframe));
      data = fetched.result;
      fetchMs = fetched.duration_ms;
    } catch (error) {
      log.error('Failed to fetch market data', { error: describeError(error) });
      return null;
    }

    const { result: signal, duration_ms: analysisMs } = measureSync(() => generateSignal(data.bars, this.signalConfig));
    if (isErrorSignal(signal)) {
      log.error('Signal generation failed', { error: signal.error, code: signal.code });
      return null;
    }

    this.sessionLog.record(signal);
    log.info('Signal generated', {
      provider: data.provider,
      bars: data.bars.length,
      direction: signal.direction,
      strength: signal.strength,
      confidence: signal.confidence,
      fetch_ms: fetchMs,
      analysis_ms: analysisMs,
    });

    return signal;
  }

  /**
   * Analyse every chart timeframe in turn and vote on a consensus.
   */
  async runMultiTimeframeAnalysis(): Promise<MultiTimeframeResult> {
    const results: Record<ChartTimeframe, TradeSignal | null> = {
      [ChartTimeframe.OneDay]: null,
      [ChartTimeframe.TwoDay]: null,
      [ChartTimeframe.FiveDay]: null,
    };

    for (const timeframe of getAllChartTimeframes()) {
      results[timeframe] = await this.runSingleAnalysis(timeframe);
    }

    const directions = Object.values(results).flatMap((signal) => (signal ? [signal.direction] : []));
    return { results, consensus: calculateTimeframeConsensus(directions) };
  }

  /**
   * Single analysis reported in backtest form. No historical replay.
   */
  async runBacktest(timeframe: ChartTimeframe = ChartTimeframe.FiveDay): Promise<BacktestReport> {
    const result = await this.runSingleAnalysis(timeframe);
    if (!result) {
      return { mode: 'BACKTEST', timeframe, status: 'FAILED' };
    }

    return {
      mode: 'BACKTEST',
      timeframe,
      status: 'COMPLETED',
      result,
      performanceMetrics: calculatePerformanceMetrics(result),
    };
  }

  /**
   * Repeated single analyses, optionally spaced by `intervalMs`.
   */
  async runRealtime(
    timeframe: ChartTimeframe = ChartTimeframe.OneDay,
    options: RealtimeOptions = {}
  ): Promise<Array<TradeSignal | null>> {
    const { iterations = 1, intervalMs = 0, onIteration } = options;
    const signals: Array<TradeSignal | null> = [];

    for (let i = 0; i < iterations; i++) {
      if (i > 0 && intervalMs > 0) {
        this.logger.debug('Waiting for next analysis cycle', { intervalMs });
        await this.sleep(intervalMs);
      }

      const signal = await this.runSingleAnalysis(timeframe);
      signals.push(signal);
      onIteration?.(i + 1, signal);
    }

    return signals;
  }

  getSessionSummary(): SessionSummary {
    return this.sessionLog.summary();
  }
}
