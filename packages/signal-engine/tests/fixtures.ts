/**
 * @fileoverview Shared builders for signal engine tests.
 */

import type { FactorJudgments, MarketBar } from '@bullion/contracts';
import type { IndicatorSnapshot } from '@bullion/indicators';

const BASE_TIME = new Date('2025-01-15T14:30:00Z').getTime();
const FIVE_MINUTES = 5 * 60 * 1000;

/**
 * Bars with the given closes, a 2-point range and constant volume.
 */
export function createTestBars(closes: number[], volume = 1000): MarketBar[] {
  return closes.map((close, i) => ({
    timestamp: new Date(BASE_TIME + i * FIVE_MINUTES).toISOString(),
    open: close,
    high: close + 1,
    low: close - 1,
    close,
    volume,
  }));
}

/**
 * 50 flat bars at 100 followed by three moves of `step`, each bar spanning
 * close +/- 0.25. Volume is constant.
 */
export function createBreakoutBars(step: number): MarketBar[] {
  const closes = [...Array.from({ length: 50 }, () => 100), 100 + step, 100 + 2 * step, 100 + 3 * step];
  return createTestBars(closes).map((bar) => ({ ...bar, high: bar.close + 0.25, low: bar.close - 0.25 }));
}

function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Seeded random-walk bars around 200.
 */
export function createRandomWalkBars(count: number, seed: number): MarketBar[] {
  const random = mulberry32(seed);
  const bars: MarketBar[] = [];
  let close = 200;

  for (let i = 0; i < count; i++) {
    const open = close;
    close = open + (random() - 0.5) * 3;
    bars.push({
      timestamp: new Date(BASE_TIME + i * FIVE_MINUTES).toISOString(),
      open,
      high: Math.max(open, close) + 0.1 + random() * 0.5,
      low: Math.min(open, close) - 0.1 - random() * 0.5,
      close,
      volume: Math.round(800 + random() * 800),
    });
  }

  return bars;
}

/**
 * A quiet-market snapshot: flat EMAs, neutral RSI, average volume,
 * price midway between support 95 and resistance 105.
 */
export function createSnapshot(overrides: Partial<IndicatorSnapshot> = {}): IndicatorSnapshot {
  return {
    emaShort: [100, 100],
    emaLong: [100, 100],
    rsi: [50, 50],
    atr: [null, 1.5],
    currentAtr: 1.5,
    levels: { support: 95, resistance: 105, pivot: 100, recentHigh: 105, recentLow: 95 },
    volume: { currentVolume: 1000, averageVolume: 1000, volumeRatio: 1, isHighVolume: false },
    trend: { direction: 'NEUTRAL', strength: 0, separationPercent: 0, emaShort: 100, emaLong: 100 },
    crossover: { crossover: 'NONE', strength: 0, currentSeparation: 0, previousSeparation: 0 },
    rsiAnalysis: {
      currentRsi: 50,
      condition: 'NEUTRAL',
      signalBias: 'NEUTRAL',
      momentum: 0,
      isOverbought: false,
      isOversold: false,
    },
    currentPrice: 100,
    timestamp: '2025-01-15T18:40:00.000Z',
    ...overrides,
  };
}

type Vote = 'BUY' | 'SELL' | 'HOLD';

/**
 * Factor judgments with the given directional votes and strengths.
 */
export function createJudgments(
  votes: { trend: [Vote, number]; rsi: [Vote, number]; priceStructure: [Vote, number] },
  volumeStrength = 0
): FactorJudgments {
  return {
    trend: {
      direction: votes.trend[0],
      strength: votes.trend[1],
      reasons: ['trend'],
      crossoverType: 'NONE',
      trendDirection: 'NEUTRAL',
      trendStrength: 0,
    },
    rsi: {
      direction: votes.rsi[0],
      strength: votes.rsi[1],
      reasons: ['rsi'],
      currentRsi: 50,
      condition: 'NEUTRAL',
      momentum: 0,
    },
    volume: {
      direction: 'NEUTRAL',
      strength: volumeStrength,
      reasons: ['volume'],
      volumeRatio: 1,
      isHighVolume: false,
    },
    priceStructure: {
      direction: votes.priceStructure[0],
      strength: votes.priceStructure[1],
      reasons: ['price'],
      supportLevel: 95,
      resistanceLevel: 105,
      trendDirection: 'NEUTRAL',
    },
  };
}
