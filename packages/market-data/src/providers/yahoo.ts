/**
 * @fileoverview Yahoo Finance chart API provider.
 *
 * @module @bullion/market-data/providers/yahoo
 */

import axios, { type AxiosInstance } from 'axios';
import { ProviderError, TIMEFRAME_SPECS, type ChartTimeframe, type MarketBar } from '@bullion/contracts';
import { toProviderError } from '../http.js';
import type { MarketDataProvider } from '../types.js';

const YAHOO_BASE_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

export interface YahooChartResponse {
  chart?: {
    result?: Array<{
      timestamp?: number[];
      indicators?: {
        quote?: Array<{
          open?: Array<number | null>;
          high?: Array<number | null>;
          low?: Array<number | null>;
          close?: Array<number | null>;
          volume?: Array<number | null>;
        }>;
      };
    }> | null;
    error?: {
      code?: string;
      description?: string;
    } | null;
  };
}

export interface YahooFinanceProviderOptions {
  httpClient?: AxiosInstance;
  timeoutMs?: number;
}

/**
 * Flattens a chart response into bars, skipping rows with a missing price.
 * A missing volume is read as 0.
 */
export function parseChartResponse(data: YahooChartResponse): MarketBar[] {
  const result = data.chart?.result?.[0];
  if (!result || !result.timestamp) {
    const description = data.chart?.error?.description ?? 'Unknown Yahoo Finance error';
    throw new ProviderError(`Yahoo Finance response invalid: ${description}`, { provider: 'yahoo-finance' });
  }

  const quote = result.indicators?.quote?.[0];
  if (!quote) {
    throw new ProviderError('Yahoo Finance response missing quote data', { provider: 'yahoo-finance' });
  }

  const bars: MarketBar[] = [];
  result.timestamp.forEach((seconds, i) => {
    const open = quote.open?.[i];
    const high = quote.high?.[i];
    const low = quote.low?.[i];
    const close = quote.close?.[i];

    if (open == null || high == null || low == null || close == null) {
      return;
    }

    bars.push({
      timestamp: new Date(seconds * 1000).toISOString(),
      open,
      high,
      low,
      close,
      volume: quote.volume?.[i] ?? 0,
    });
  });

  return bars;
}

export class YahooFinanceProvider implements MarketDataProvider {
  readonly id = 'yahoo-finance';

  private readonly http: AxiosInstance;

  constructor(options: YahooFinanceProviderOptions = {}) {
    this.http =
      options.httpClient ??
      axios.create({
        baseURL: YAHOO_BASE_URL,
        timeout: options.timeoutMs ?? 10_000,
        headers: { 'User-Agent': 'Mozilla/5.0' },
      });
  }

  async getBars(symbol: string, timeframe: ChartTimeframe): Promise<MarketBar[]> {
    const spec = TIMEFRAME_SPECS[timeframe];

    let data: YahooChartResponse;
    try {
      const response = await this.http.get<YahooChartResponse>(`/${encodeURIComponent(symbol)}`, {
        params: {
          interval: spec.yahooInterval,
          range: spec.yahooRange,
          includePrePost: false,
        },
      });
      data = response.data;
    } catch (error) {
      throw toProviderError(this.id, 'Yahoo Finance', error);
    }

    const bars = parseChartResponse(data);
    if (bars.length === 0) {
      throw new ProviderError('No data received from Yahoo Finance', { provider: this.id });
    }
    return bars;
  }
}
