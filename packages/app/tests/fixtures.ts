/**
 * @fileoverview Builders shared by the app tests: a bar source backed by demo
 * data, a hand-written trade signal and a log capture.
 */

import { Writable } from 'node:stream';
import { vi } from 'vitest';
import winston from 'winston';
import { ChartTimeframe, type MarketBar, type TradeSignal } from '@bullion/contracts';
import { createLogger, type Logger } from '@bullion/logger';
import { generateDemoBars, type MarketDataResult } from '@bullion/market-data';
import type { BarSource } from '../src/bot.js';

export const AS_OF = new Date('2025-01-15T21:00:00Z');

export function createSilentLogger(): Logger {
  return createLogger({ level: 'debug', json: true, console: false });
}

export function captureLines(logger: Logger): Array<Record<string, unknown>> {
  const lines: Array<Record<string, unknown>> = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      for (const line of chunk.toString().split('\n')) {
        if (line.trim()) {
          lines.push(JSON.parse(line));
        }
      }
      callback();
    },
  });
  logger.add(new winston.transports.Stream({ stream }));
  return lines;
}

export const flush = () => new Promise((resolve) => setTimeout(resolve, 20));

/**
 * A bar source answering every request with seeded demo bars, or with
 * `bars` when given.
 */
export function createBarSource(bars?: MarketBar[]) {
  const getBars = vi.fn(
    async (symbol: string, timeframe: ChartTimeframe): Promise<MarketDataResult> => ({
      provider: 'demo',
      symbol,
      timeframe,
      bars: bars ?? generateDemoBars({ timeframe, asOf: AS_OF }),
      attempts: [],
    })
  );
  const source: BarSource = { getBars };
  return { source, getBars };
}

export function createFailingSource(message = 'All providers failed') {
  const getBars = vi.fn(async (): Promise<MarketDataResult> => {
    throw new Error(message);
  });
  const source: BarSource = { getBars };
  return { source, getBars };
}

/**
 * A weak BUY at 100 with support 99.50 and resistance 105.
 */
export function createTradeSignal(overrides: Partial<TradeSignal> = {}): TradeSignal {
  return {
    direction: 'BUY',
    timestamp: '2025-01-15T18:40:00.000Z',
    currentPrice: 100,
    strength: 2,
    confidence: 1.33,
    consensus: 2 / 3,
    scores: { BUY: 2, SELL: 0, HOLD: 0 },
    components: {
      trend: {
        direction: 'BUY',
        strength: 1.2,
        reasons: ['EMA-9 crossed above EMA-21'],
        crossoverType: 'BULLISH',
        trendDirection: 'BULLISH',
        trendStrength: 0.6,
      },
      rsi: {
        direction: 'HOLD',
        strength: 0,
        reasons: ['RSI neutral at 55.0'],
        currentRsi: 55,
        condition: 'NEUTRAL',
        momentum: -0.04,
      },
      volume: {
        direction: 'NEUTRAL',
        strength: 0,
        reasons: ['Normal volume (1.0x average)'],
        volumeRatio: 1,
        isHighVolume: false,
      },
      priceStructure: {
        direction: 'BUY',
        strength: 2,
        reasons: ['Price near support level ($99.50)'],
        supportLevel: 99.5,
        resistanceLevel: 105,
        trendDirection: 'BULLISH',
      },
    },
    risk: {
      stopLoss: 98.51,
      takeProfit: 102.98,
      riskAmount: 1.49,
      rewardAmount: 2.98,
      riskRewardRatio: 2,
      atrValue: 1.5,
    },
    marketContext: {
      trendDirection: 'BULLISH',
      trendStrength: 0.6,
      rsiCondition: 'NEUTRAL',
      volumeStatus: 'NORMAL',
      supportLevel: 99.5,
      resistanceLevel: 105,
    },
    recommendation: 'WEAK BUY - Low confidence signal (Score: 1.3/10)',
    ...overrides,
  };
}
