/**
 * @fileoverview Synthetic gold price data for demo mode and offline use.
 *
 * Bars follow a gentle uptrend plus noise and a slow cycle around a base
 * price of 200 (a GLD-like level). The same seed and clock always produce
 * the same series.
 *
 * @module @bullion/market-data/providers/demo
 */

import { TIMEFRAME_SPECS, type ChartTimeframe, type MarketBar } from '@bullion/contracts';
import { createSeededRandom, linspace, type SeededRandom } from '../random.js';
import type { ClockFn, MarketDataProvider } from '../types.js';

export const DEMO_BASE_PRICE = 200;
export const DEMO_BAR_COUNT = 100;
export const DEMO_SEED = 42;

/**
 * Market shape to simulate. `normal` mixes trend, noise and a cycle; the
 * others are pronounced trends for exercising the signal engine.
 */
export type DemoScenario = 'normal' | 'bullish' | 'bearish' | 'sideways';

export const DEMO_SCENARIOS: readonly DemoScenario[] = ['normal', 'bullish', 'bearish', 'sideways'];

export interface DemoDataOptions {
  timeframe: ChartTimeframe;
  asOf: Date;
  count?: number;
  seed?: number;
  scenario?: DemoScenario;
  basePrice?: number;
}

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function scenarioCloses(scenario: DemoScenario, count: number, base: number, random: SeededRandom): number[] {
  switch (scenario) {
    case 'bullish':
    case 'bearish': {
      const trend = linspace(0, scenario === 'bullish' ? 15 : -15, count);
      return trend.map((t) => base + t + random.normal(0, 1));
    }
    case 'sideways':
      return Array.from({ length: count }, () => base + random.normal(0, 0.5) + random.normal(0, 2));
    case 'normal': {
      const trend = linspace(0, 5, count);
      const cycle = linspace(0, 4 * Math.PI, count).map((x) => 3 * Math.sin(x));
      return trend.map((t, i) => base + t + random.normal(0, 2) + (cycle[i] ?? 0));
    }
  }
}

/**
 * Builds a deterministic OHLCV series ending shortly before `asOf`.
 *
 * @example
 * ```typescript
 * const bars = generateDemoBars({ timeframe: ChartTimeframe.OneDay, asOf: new Date() });
 * bars.length; // 100
 * ```
 */
export function generateDemoBars(options: DemoDataOptions): MarketBar[] {
  const {
    timeframe,
    asOf,
    count = DEMO_BAR_COUNT,
    seed = DEMO_SEED,
    scenario = 'normal',
    basePrice = DEMO_BASE_PRICE,
  } = options;

  const spec = TIMEFRAME_SPECS[timeframe];
  const random = createSeededRandom(seed);
  const start = asOf.getTime() - spec.lookbackDays * DAY_MS;
  const intervalMs = spec.candleMinutes * MINUTE_MS;
  const trending = scenario !== 'normal';

  const closes = scenarioCloses(scenario, count, basePrice, random);
  const bars: MarketBar[] = [];

  closes.forEach((close, i) => {
    const previous = closes[i - 1];
    const volatility = trending ? random.uniform(0.3, 1.0) : random.uniform(0.5, 2.0);
    let high = close + random.uniform(0, volatility);
    let low = close - random.uniform(0, volatility);

    let open: number;
    if (previous === undefined) {
      open = trending ? close : close + random.uniform(-0.5, 0.5);
    } else {
      open = previous + (trending ? random.uniform(-0.2, 0.2) : random.uniform(-0.3, 0.3));
    }

    high = Math.max(high, open, close);
    low = Math.min(low, open, close);

    let volume: number;
    if (trending) {
      volume = random.integer(1_000_000, 4_000_000);
    } else {
      // Bigger moves trade heavier
      const change = Math.abs(close - (previous ?? close));
      volume = Math.floor(random.uniform(1_000_000, 3_000_000) * (1 + (change / close) * 10));
    }

    bars.push({
      timestamp: new Date(start + i * intervalMs).toISOString(),
      open: round2(open),
      high: round2(high),
      low: round2(low),
      close: round2(close),
      volume,
    });
  });

  return bars;
}

export interface DemoDataProviderOptions {
  now?: ClockFn;
  seed?: number;
  count?: number;
  scenario?: DemoScenario;
}

export class DemoDataProvider implements MarketDataProvider {
  readonly id = 'demo';

  private readonly now: ClockFn;
  private readonly seed: number;
  private readonly count: number;
  private readonly scenario: DemoScenario;

  constructor(options: DemoDataProviderOptions = {}) {
    this.now = options.now ?? Date.now;
    this.seed = options.seed ?? DEMO_SEED;
    this.count = options.count ?? DEMO_BAR_COUNT;
    this.scenario = options.scenario ?? 'normal';
  }

  async getBars(_symbol: string, timeframe: ChartTimeframe): Promise<MarketBar[]> {
    return generateDemoBars({
      timeframe,
      asOf: new Date(this.now()),
      count: this.count,
      seed: this.seed,
      scenario: this.scenario,
    });
  }
}
