/**
 * @fileoverview Tests for chart timeframe utilities.
 */

import { describe, it, expect } from 'vitest';
import {
  ChartTimeframe,
  TIMEFRAME_SPECS,
  isChartTimeframe,
  parseChartTimeframe,
  getAllChartTimeframes,
  describeTimeframe,
} from '../src/timeframes.js';
import { ConfigurationError } from '../src/errors.js';

describe('ChartTimeframe', () => {
  it('should list timeframes from shortest to longest window', () => {
    expect(getAllChartTimeframes()).toEqual(['1d', '2d', '5d']);
  });

  it('should map each timeframe to its candle width', () => {
    expect(TIMEFRAME_SPECS[ChartTimeframe.OneDay].candleMinutes).toBe(5);
    expect(TIMEFRAME_SPECS[ChartTimeframe.TwoDay].candleMinutes).toBe(15);
    expect(TIMEFRAME_SPECS[ChartTimeframe.FiveDay].candleMinutes).toBe(30);
  });

  it('should carry provider interval codes', () => {
    const spec = TIMEFRAME_SPECS[ChartTimeframe.TwoDay];
    expect(spec.yahooInterval).toBe('15m');
    expect(spec.yahooRange).toBe('2d');
    expect(spec.alphaVantageInterval).toBe('15min');
  });

  it('should describe timeframes', () => {
    expect(describeTimeframe(ChartTimeframe.OneDay)).toBe('1-day chart with 5-minute candles');
  });
});

describe('isChartTimeframe', () => {
  it('should accept supported values', () => {
    expect(isChartTimeframe('1d')).toBe(true);
    expect(isChartTimeframe('5d')).toBe(true);
  });

  it('should reject unsupported values', () => {
    expect(isChartTimeframe('1w')).toBe(false);
    expect(isChartTimeframe('')).toBe(false);
  });
});

describe('parseChartTimeframe', () => {
  it('should normalize case and whitespace', () => {
    expect(parseChartTimeframe(' 2D ')).toBe(ChartTimeframe.TwoDay);
  });

  it('should throw ConfigurationError for unknown values', () => {
    expect(() => parseChartTimeframe('1h')).toThrow(ConfigurationError);
    expect(() => parseChartTimeframe('1h')).toThrow('Unsupported timeframe "1h". Use one of: 1d, 2d, 5d');
  });
});
