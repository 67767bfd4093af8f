/**
 * @fileoverview Alpha Vantage intraday provider.
 *
 * Fetches TIME_SERIES_INTRADAY candles through axios, throttled to the free
 * tier's request rate, and trims them to the chart window.
 *
 * @module @bullion/market-data/providers/alpha-vantage
 */

import axios, { type AxiosInstance } from 'axios';
import {
  ProviderError,
  ProviderRateLimitError,
  TIMEFRAME_SPECS,
  type ChartTimeframe,
  type MarketBar,
} from '@bullion/contracts';
import type { Logger } from '@bullion/logger';
import { isRecord, toProviderError } from '../http.js';
import { RateLimiter } from '../rate-limiter.js';
import type { MarketDataProvider } from '../types.js';

const ALPHA_VANTAGE_BASE_URL = 'https://www.alphavantage.co/query';
const INTRADAY_FUNCTION = 'TIME_SERIES_INTRADAY';
const DAY_MS = 24 * 60 * 60 * 1000;

export interface AlphaVantageProviderOptions {
  apiKey: string;
  httpClient?: AxiosInstance;
  rateLimiter?: RateLimiter;
  timeoutMs?: number;
  logger?: Logger;
}

function readPrice(candle: Record<string, unknown>, key: string): number {
  const raw = candle[key];
  return typeof raw === 'string' || typeof raw === 'number' ? Number.parseFloat(String(raw)) : Number.NaN;
}

/**
 * Converts the `Time Series (...)` object into ascending bars. Timestamps are
 * read as UTC; rows with a non-numeric price are dropped.
 */
export function parseIntradaySeries(series: Record<string, unknown>): MarketBar[] {
  const bars: MarketBar[] = [];

  for (const [timestamp, candle] of Object.entries(series)) {
    if (!isRecord(candle)) continue;

    const time = Date.parse(`${timestamp.replace(' ', 'T')}Z`);
    const bar = {
      open: readPrice(candle, '1. open'),
      high: readPrice(candle, '2. high'),
      low: readPrice(candle, '3. low'),
      close: readPrice(candle, '4. close'),
      volume: readPrice(candle, '5. volume'),
    };

    if (Number.isNaN(time) || !Object.values(bar).every(Number.isFinite)) {
      continue;
    }

    bars.push({ timestamp: new Date(time).toISOString(), ...bar });
  }

  return bars.sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
}

/**
 * Keeps the bars within `days` of the most recent one.
 */
export function clipToLookback(bars: MarketBar[], days: number): MarketBar[] {
  const last = bars[bars.length - 1];
  if (!last) return bars;
  const cutoff = Date.parse(last.timestamp) - days * DAY_MS;
  return bars.filter((bar) => Date.parse(bar.timestamp) >= cutoff);
}

export class AlphaVantageProvider implements MarketDataProvider {
  readonly id = 'alpha-vantage';

  private readonly apiKey: string;
  private readonly http: AxiosInstance;
  private readonly rateLimiter: RateLimiter;
  private readonly logger?: Logger;

  constructor(options: AlphaVantageProviderOptions) {
    if (!options.apiKey) {
      throw new ProviderError('Alpha Vantage API key is required', { provider: 'alpha-vantage' });
    }

    this.apiKey = options.apiKey;
    this.http =
      options.httpClient ?? axios.create({ baseURL: ALPHA_VANTAGE_BASE_URL, timeout: options.timeoutMs ?? 30_000 });
    this.rateLimiter = options.rateLimiter ?? new RateLimiter();
    this.logger = options.logger;
  }

  async getBars(symbol: string, timeframe: ChartTimeframe): Promise<MarketBar[]> {
    const spec = TIMEFRAME_SPECS[timeframe];
    const interval = spec.alphaVantageInterval;

    const waited = await this.rateLimiter.acquire();
    if (waited > 0) {
      this.logger?.debug('Rate limiting Alpha Vantage request', { waitMs: waited });
    }

    let data: unknown;
    try {
      const response = await this.http.get<unknown>('', {
        params: {
          function: INTRADAY_FUNCTION,
          symbol,
          interval,
          outputsize: 'full',
          apikey: this.apiKey,
        },
      });
      data = response.data;
    } catch (error) {
      throw toProviderError(this.id, 'Alpha Vantage', error);
    }

    if (!isRecord(data)) {
      throw new ProviderError('Alpha Vantage returned a non-object payload', { provider: this.id });
    }

    const errorMessage = data['Error Message'];
    if (typeof errorMessage === 'string') {
      throw new ProviderError(`Alpha Vantage error: ${errorMessage}`, { provider: this.id });
    }

    const notice = data['Note'] ?? data['Information'];
    if (typeof notice === 'string') {
      throw new ProviderRateLimitError(`Alpha Vantage rate limit: ${notice}`, { provider: this.id, retryAfter: 60 });
    }

    const series = data[`Time Series (${interval})`];
    if (!isRecord(series)) {
      throw new ProviderError('No time series data found in Alpha Vantage response', { provider: this.id });
    }

    return clipToLookback(parseIntradaySeries(series), spec.lookbackDays);
  }
}
