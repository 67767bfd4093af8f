/**
 * @fileoverview Tests for the Alpha Vantage, Yahoo Finance and demo providers.
 *
 * HTTP providers run against an in-process axios adapter.
 */

import { describe, it, expect, vi } from 'vitest';
import { ChartTimeframe, ProviderError, ProviderRateLimitError, validateBarSeries } from '@bullion/contracts';
import { AlphaVantageProvider, parseIntradaySeries } from '../src/providers/alpha-vantage.js';
import { YahooFinanceProvider, parseChartResponse } from '../src/providers/yahoo.js';
import { DemoDataProvider, generateDemoBars } from '../src/providers/demo.js';
import { RateLimiter } from '../src/rate-limiter.js';
import { createHttpClient } from './fixtures.js';

function createClock(start = 0) {
  let now = start;
  return {
    now: () => now,
    sleep: vi.fn(async (ms: number) => {
      now += ms;
    }),
    advance(ms: number) {
      now += ms;
    },
  };
}

const intradayPayload = {
  'Meta Data': { '2. Symbol': 'GLD', '4. Interval': '5min' },
  'Time Series (5min)': {
    '2025-01-15 14:35:00': {
      '1. open': '200.10',
      '2. high': '200.50',
      '3. low': '199.90',
      '4. close': '200.40',
      '5. volume': '1200',
    },
    '2025-01-15 14:30:00': {
      '1. open': '199.80',
      '2. high': '200.20',
      '3. low': '199.70',
      '4. close': '200.10',
      '5. volume': '900',
    },
    '2025-01-13 10:00:00': {
      '1. open': '198.00',
      '2. high': '198.50',
      '3. low': '197.50',
      '4. close': '198.20',
      '5. volume': '700',
    },
  },
};

describe('RateLimiter', () => {
  it('should let the first request through immediately', async () => {
    const clock = createClock(1_000);
    const limiter = new RateLimiter({ minIntervalMs: 12_000, now: clock.now, sleep: clock.sleep });

    expect(await limiter.acquire()).toBe(0);
    expect(clock.sleep).not.toHaveBeenCalled();
  });

  it('should wait out the remainder of the interval', async () => {
    const clock = createClock(1_000);
    const limiter = new RateLimiter({ minIntervalMs: 12_000, now: clock.now, sleep: clock.sleep });

    await limiter.acquire();
    clock.advance(5_000);

    expect(limiter.pendingDelay()).toBe(7_000);
    expect(await limiter.acquire()).toBe(7_000);
    expect(clock.sleep).toHaveBeenCalledWith(7_000);
    expect(limiter.pendingDelay()).toBe(12_000);
  });
});

describe('AlphaVantageProvider', () => {
  it('should request the intraday series for the timeframe', async () => {
    const { client, adapter } = createHttpClient(() => ({ status: 200, data: intradayPayload }));
    const provider = new AlphaVantageProvider({ apiKey: 'test-secret', httpClient: client });

    await provider.getBars('GLD', ChartTimeframe.OneDay);

    expect(adapter.mock.calls[0]?.[0].params).toEqual({
      function: 'TIME_SERIES_INTRADAY',
      symbol: 'GLD',
      interval: '5min',
      outputsize: 'full',
      apikey: 'test-secret',
    });
  });

  it('should parse, sort and clip bars to the chart window', async () => {
    const { client } = createHttpClient(() => ({ status: 200, data: intradayPayload }));
    const provider = new AlphaVantageProvider({ apiKey: 'test-secret', httpClient: client });

    const bars = await provider.getBars('GLD', ChartTimeframe.OneDay);

    expect(bars).toEqual([
      { timestamp: '2025-01-15T14:30:00.000Z', open: 199.8, high: 200.2, low: 199.7, close: 200.1, volume: 900 },
      { timestamp: '2025-01-15T14:35:00.000Z', open: 200.1, high: 200.5, low: 199.9, close: 200.4, volume: 1200 },
    ]);
  });

  it('should keep older bars for a wider window', async () => {
    const { client } = createHttpClient(() => ({
      status: 200,
      data: { 'Time Series (30min)': intradayPayload['Time Series (5min)'] },
    }));
    const provider = new AlphaVantageProvider({ apiKey: 'test-secret', httpClient: client });

    const bars = await provider.getBars('GLD', ChartTimeframe.FiveDay);

    expect(bars).toHaveLength(3);
    expect(bars[0]?.timestamp).toBe('2025-01-13T10:00:00.000Z');
  });

  it('should reject construction without an API key', () => {
    expect(() => new AlphaVantageProvider({ apiKey: '' })).toThrow('Alpha Vantage API key is required');
  });

  it('should map a Note payload to a rate limit error', async () => {
    const { client } = createHttpClient(() => ({ status: 200, data: { Note: 'Thank you for using Alpha Vantage!' } }));
    const provider = new AlphaVantageProvider({ apiKey: 'test-secret', httpClient: client });

    const failure = provider.getBars('GLD', ChartTimeframe.OneDay);

    await expect(failure).rejects.toBeInstanceOf(ProviderRateLimitError);
    await expect(failure).rejects.toThrow('Alpha Vantage rate limit: Thank you for using Alpha Vantage!');
  });

  it('should map an Error Message payload to a provider error', async () => {
    const { client } = createHttpClient(() => ({ status: 200, data: { 'Error Message': 'Invalid API call.' } }));
    const provider = new AlphaVantageProvider({ apiKey: 'test-secret', httpClient: client });

    await expect(provider.getBars('GLD', ChartTimeframe.OneDay)).rejects.toThrow(
      'Alpha Vantage error: Invalid API call.'
    );
  });

  it('should fail when the expected series key is missing', async () => {
    const { client } = createHttpClient(() => ({ status: 200, data: intradayPayload }));
    const provider = new AlphaVantageProvider({ apiKey: 'test-secret', httpClient: client });

    await expect(provider.getBars('GLD', ChartTimeframe.TwoDay)).rejects.toThrow(
      'No time series data found in Alpha Vantage response'
    );
  });

  it('should space consecutive requests through the rate limiter', async () => {
    const clock = createClock();
    const { client } = createHttpClient(() => ({ status: 200, data: intradayPayload }));
    const provider = new AlphaVantageProvider({
      apiKey: 'test-secret',
      httpClient: client,
      rateLimiter: new RateLimiter({ now: clock.now, sleep: clock.sleep }),
    });

    await provider.getBars('GLD', ChartTimeframe.OneDay);
    await provider.getBars('GLD', ChartTimeframe.OneDay);

    expect(clock.sleep).toHaveBeenCalledTimes(1);
    expect(clock.sleep).toHaveBeenCalledWith(12_000);
  });

  it('should skip rows with non-numeric prices', () => {
    const bars = parseIntradaySeries({
      '2025-01-15 14:30:00': { '1. open': 'n/a', '2. high': '1', '3. low': '1', '4. close': '1', '5. volume': '1' },
      '2025-01-15 14:35:00': { '1. open': '1', '2. high': '2', '3. low': '0.5', '4. close': '1.5', '5. volume': '10' },
    });

    expect(bars).toEqual([{ timestamp: '2025-01-15T14:35:00.000Z', open: 1, high: 2, low: 0.5, close: 1.5, volume: 10 }]);
  });
});

describe('YahooFinanceProvider', () => {
  const chart = {
    chart: {
      result: [
        {
          timestamp: [1736951400, 1736951700, 1736952000],
          indicators: {
            quote: [
              {
                open: [200, null, 201],
                high: [201, null, 202],
                low: [199.5, null, 200.5],
                close: [200.5, null, 201.5],
                volume: [1500, null, null],
              },
            ],
          },
        },
      ],
      error: null,
    },
  };

  it('should request the chart for the symbol with interval and range', async () => {
    const { client, adapter } = createHttpClient(() => ({ status: 200, data: chart }));
    const provider = new YahooFinanceProvider({ httpClient: client });

    await provider.getBars('GLD', ChartTimeframe.TwoDay);

    const request = adapter.mock.calls[0]?.[0];
    expect(request?.url).toBe('/GLD');
    expect(request?.params).toEqual({ interval: '15m', range: '2d', includePrePost: false });
  });

  it('should skip null rows and default missing volume to 0', async () => {
    const { client } = createHttpClient(() => ({ status: 200, data: chart }));
    const provider = new YahooFinanceProvider({ httpClient: client });

    const bars = await provider.getBars('GLD', ChartTimeframe.OneDay);

    expect(bars).toEqual([
      { timestamp: '2025-01-15T14:30:00.000Z', open: 200, high: 201, low: 199.5, close: 200.5, volume: 1500 },
      { timestamp: '2025-01-15T14:40:00.000Z', open: 201, high: 202, low: 200.5, close: 201.5, volume: 0 },
    ]);
  });

  it('should surface the chart error description', () => {
    expect(() =>
      parseChartResponse({ chart: { result: null, error: { code: 'Not Found', description: 'No data found' } } })
    ).toThrow('Yahoo Finance response invalid: No data found');
  });

  it('should map HTTP 429 to a rate limit error', async () => {
    const { client } = createHttpClient(() => ({ status: 429, data: 'Too Many Requests' }));
    const provider = new YahooFinanceProvider({ httpClient: client });

    await expect(provider.getBars('GLD', ChartTimeframe.OneDay)).rejects.toBeInstanceOf(ProviderRateLimitError);
  });

  it('should map other HTTP failures to a provider error', async () => {
    const { client } = createHttpClient(() => ({ status: 500, data: 'Internal Server Error' }));
    const provider = new YahooFinanceProvider({ httpClient: client });

    const failure = provider.getBars('GLD', ChartTimeframe.OneDay);

    await expect(failure).rejects.toBeInstanceOf(ProviderError);
    await expect(failure).rejects.toThrow('Yahoo Finance request failed: HTTP 500');
  });
});

describe('demo data', () => {
  const asOf = new Date('2025-01-15T20:00:00.000Z');

  it('should produce 100 valid bars at the candle interval', () => {
    const bars = generateDemoBars({ timeframe: ChartTimeframe.OneDay, asOf });

    expect(bars).toHaveLength(100);
    expect(bars[0]?.timestamp).toBe('2025-01-14T20:00:00.000Z');
    expect(bars[1]?.timestamp).toBe('2025-01-14T20:05:00.000Z');
    expect(validateBarSeries(bars).ok).toBe(true);
  });

  it('should space 5-day bars 30 minutes apart', () => {
    const bars = generateDemoBars({ timeframe: ChartTimeframe.FiveDay, asOf });

    expect(bars[0]?.timestamp).toBe('2025-01-10T20:00:00.000Z');
    expect(bars[1]?.timestamp).toBe('2025-01-10T20:30:00.000Z');
  });

  it('should be reproducible for a seed', () => {
    const first = generateDemoBars({ timeframe: ChartTimeframe.OneDay, asOf, seed: 7 });
    const second = generateDemoBars({ timeframe: ChartTimeframe.OneDay, asOf, seed: 7 });
    const other = generateDemoBars({ timeframe: ChartTimeframe.OneDay, asOf, seed: 8 });

    expect(second).toEqual(first);
    expect(other).not.toEqual(first);
  });

  it('should stay near the base price', () => {
    const closes = generateDemoBars({ timeframe: ChartTimeframe.OneDay, asOf }).map((bar) => bar.close);

    expect(Math.min(...closes)).toBeGreaterThan(180);
    expect(Math.max(...closes)).toBeLessThan(220);
  });

  it('should generate valid bars for every scenario', () => {
    for (const scenario of ['normal', 'bullish', 'bearish', 'sideways'] as const) {
      const bars = generateDemoBars({ timeframe: ChartTimeframe.TwoDay, asOf, scenario });
      expect(validateBarSeries(bars).ok).toBe(true);
    }
  });

  it('should trend down in the bearish scenario', () => {
    const bars = generateDemoBars({ timeframe: ChartTimeframe.OneDay, asOf, scenario: 'bearish' });

    expect((bars[99]?.close ?? 0) - (bars[0]?.close ?? 0)).toBeLessThan(-8);
  });

  it('should use the injected clock in the provider', async () => {
    const provider = new DemoDataProvider({ now: () => asOf.getTime() });

    const bars = await provider.getBars('GLD', ChartTimeframe.OneDay);

    expect(bars).toEqual(generateDemoBars({ timeframe: ChartTimeframe.OneDay, asOf }));
  });
});
