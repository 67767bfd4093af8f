/**
 * @fileoverview Fallback chain over market data providers.
 *
 * Providers are tried in order; a provider that throws or returns a series
 * that fails validation is recorded and skipped. Demo data is the final
 * fallback, so a caller always receives bars unless the demo generator
 * itself produces an invalid series.
 *
 * @module @bullion/market-data/composite
 */

import {
  MIN_ANALYSIS_BARS,
  ProviderError,
  describeTimeframe,
  validateBarSeries,
  type BarSeries,
  type ChartTimeframe,
} from '@bullion/contracts';
import { createChildLogger, type Logger } from '@bullion/logger';
import { AlphaVantageProvider } from './providers/alpha-vantage.js';
import { DemoDataProvider, type DemoScenario } from './providers/demo.js';
import { RateLimiter } from './rate-limiter.js';
import { YahooFinanceProvider } from './providers/yahoo.js';
import type { MarketDataProvider, MarketDataResult, ProviderAttempt } from './types.js';

export interface CompositeMarketDataOptions {
  /** Live providers in priority order */
  providers: MarketDataProvider[];
  /** Final fallback, and the only source in demo mode */
  demo: MarketDataProvider;
  demoMode?: boolean;
  minBars?: number;
  logger: Logger;
}

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class CompositeMarketDataSource {
  private readonly providers: MarketDataProvider[];
  private readonly demo: MarketDataProvider;
  private readonly demoMode: boolean;
  private readonly minBars: number;
  private readonly logger: Logger;

  constructor(options: CompositeMarketDataOptions) {
    this.providers = options.providers;
    this.demo = options.demo;
    this.demoMode = options.demoMode ?? false;
    this.minBars = options.minBars ?? MIN_ANALYSIS_BARS;
    this.logger = createChildLogger(options.logger, { component: 'market-data' });
  }

  /**
   * Ids of the sources that would be consulted, in order.
   */
  get chain(): string[] {
    return this.demoMode ? [this.demo.id] : [...this.providers.map((p) => p.id), this.demo.id];
  }

  /**
   * Fetches a validated bar series for `symbol`.
   *
   * @throws {ProviderError} When even the demo fallback fails validation
   */
  async getBars(symbol: string, timeframe: ChartTimeframe): Promise<MarketDataResult> {
    const attempts: ProviderAttempt[] = [];
    this.logger.info('Fetching market data', { symbol, timeframe, description: describeTimeframe(timeframe) });

    if (!this.demoMode) {
      for (const provider of this.providers) {
        try {
          const bars = await this.fetchValidated(provider, symbol, timeframe);
          this.logger.info('Market data fetch successful', { provider: provider.id, bars: bars.length });
          return { provider: provider.id, symbol, timeframe, bars, attempts };
        } catch (error) {
          const reason = describeFailure(error);
          attempts.push({ provider: provider.id, error: reason });
          this.logger.warn('Provider failed, falling back', { provider: provider.id, reason });
        }
      }

      this.logger.warn('All live providers failed, using demo data', {
        attempted: attempts.map((attempt) => attempt.provider),
      });
    }

    try {
      const bars = await this.fetchValidated(this.demo, symbol, timeframe);
      this.logger.info('Demo data generated', { bars: bars.length });
      return { provider: this.demo.id, symbol, timeframe, bars, attempts };
    } catch (error) {
      attempts.push({ provider: this.demo.id, error: describeFailure(error) });
      throw new ProviderError(
        `All providers failed: ${attempts.map((attempt) => `${attempt.provider}: ${attempt.error}`).join('; ')}`,
        { provider: 'composite', attempts }
      );
    }
  }

  private async fetchValidated(
    provider: MarketDataProvider,
    symbol: string,
    timeframe: ChartTimeframe
  ): Promise<BarSeries> {
    const bars = await provider.getBars(symbol, timeframe);
    const validation = validateBarSeries(bars, this.minBars);
    if (!validation.ok) {
      throw validation.error;
    }
    return validation.value;
  }
}

export interface MarketDataSourceSettings {
  alphaVantageApiKey?: string;
  demoMode?: boolean;
  timeoutMs?: number;
  minRequestIntervalMs?: number;
  demoScenario?: DemoScenario;
  logger: Logger;
}

/**
 * Wires the standard chain: Alpha Vantage (only with an API key), then
 * Yahoo Finance, then demo data.
 */
export function createMarketDataSource(settings: MarketDataSourceSettings): CompositeMarketDataSource {
  const { logger } = settings;
  const providers: MarketDataProvider[] = [];

  if (settings.alphaVantageApiKey) {
    providers.push(
      new AlphaVantageProvider({
        apiKey: settings.alphaVantageApiKey,
        timeoutMs: settings.timeoutMs,
        rateLimiter: new RateLimiter({ minIntervalMs: settings.minRequestIntervalMs }),
        logger: createChildLogger(logger, { component: 'market-data', provider: 'alpha-vantage' }),
      })
    );
  } else if (!settings.demoMode) {
    logger.warn('No Alpha Vantage API key, using Yahoo Finance');
  }

  providers.push(new YahooFinanceProvider({ timeoutMs: settings.timeoutMs }));

  return new CompositeMarketDataSource({
    providers,
    demo: new DemoDataProvider({ scenario: settings.demoScenario }),
    demoMode: settings.demoMode,
    logger,
  });
}
