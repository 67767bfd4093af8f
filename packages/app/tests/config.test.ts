/**
 * @fileoverview Tests for environment-driven configuration.
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@bullion/contracts';
import { DEFAULT_SIGNAL_CONFIG } from '@bullion/signal-engine';
import { buildSignalConfig, getConfigSummary, loadConfig } from '../src/config/index.js';

describe('loadConfig()', () => {
  it('should fill every section with defaults', () => {
    const config = loadConfig({});

    expect(config.app).toEqual({
      env: 'development',
      demoMode: false,
      symbol: 'GLD',
      name: 'Bullion Signals',
      version: '0.1.0',
    });
    expect(config.logging).toEqual({ level: 'info', format: 'pretty' });
    expect(config.provider).toEqual({ timeoutMs: 30000, minRequestIntervalMs: 12000 });
    expect(config.risk).toEqual({ defaultRiskPercent: 2, maxPositionSize: 10000 });
    expect(config.trading.mode).toBe('BACKTEST');
    expect(config.signal).toEqual({});
  });

  it('should map environment variables onto nested keys', () => {
    const config = loadConfig({
      NODE_ENV: 'test',
      DEMO_MODE: 'true',
      DEFAULT_SYMBOL: 'GC=F',
      ALPHA_VANTAGE_API_KEY: 'test-secret',
      PROVIDER_MIN_INTERVAL_MS: '0',
      TRADING_MODE: 'REALTIME',
      RSI_PERIOD: '10',
      TAKE_PROFIT_RATIO: '2.5',
    });

    expect(config.app.env).toBe('test');
    expect(config.app.demoMode).toBe(true);
    expect(config.app.symbol).toBe('GC=F');
    expect(config.provider.alphaVantageApiKey).toBe('test-secret');
    expect(config.provider.minRequestIntervalMs).toBe(0);
    expect(config.trading.mode).toBe('REALTIME');
    expect(config.signal).toEqual({ rsiPeriod: 10, takeProfitRatio: 2.5 });
  });

  it('should keep numeric-looking strings exactly as given', () => {
    const config = loadConfig({ ALPHA_VANTAGE_API_KEY: '00912345', DEFAULT_SYMBOL: '0050', LOG_FILE: '2025.log' });

    expect(config.provider.alphaVantageApiKey).toBe('00912345');
    expect(config.app.symbol).toBe('0050');
    expect(config.logging.filePath).toBe('2025.log');
  });

  it('should reject values that are not numbers or booleans where those are expected', () => {
    expect(() => loadConfig({ DEMO_MODE: 'yes' })).toThrow(/^Configuration validation failed: app\.demoMode: /);
    expect(() => loadConfig({ RSI_PERIOD: 'fourteen' })).toThrow(
      /^Configuration validation failed: signal\.rsiPeriod: /
    );
  });

  it('should read DEMO_MODE=false as false', () => {
    expect(loadConfig({ DEMO_MODE: 'false' }).app.demoMode).toBe(false);
  });

  it('should ignore empty values', () => {
    expect(loadConfig({ LOG_LEVEL: '' }).logging.level).toBe('info');
  });

  it('should list every invalid setting', () => {
    let caught: unknown;
    try {
      loadConfig({ LOG_LEVEL: 'verbose', RSI_PERIOD: '0' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) return;

    const issues = caught.data?.['issues'];
    expect(Array.isArray(issues)).toBe(true);
    if (!Array.isArray(issues)) return;
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^logging\.level: /);
    expect(issues[1]).toBe('signal.rsiPeriod: Number must be greater than 0');
    expect(caught.message).toMatch(/^Configuration validation failed: logging\.level: /);
  });
});

describe('buildSignalConfig()', () => {
  it('should return the engine defaults when nothing is set', () => {
    expect(buildSignalConfig(loadConfig({}))).toEqual(DEFAULT_SIGNAL_CONFIG);
  });

  it('should apply overrides and freeze the result', () => {
    const signalConfig = buildSignalConfig(loadConfig({ EMA_SHORT_PERIOD: '5', EMA_LONG_PERIOD: '13' }));

    expect(signalConfig.emaShortPeriod).toBe(5);
    expect(signalConfig.emaLongPeriod).toBe(13);
    expect(signalConfig.rsiPeriod).toBe(14);
    expect(Object.isFrozen(signalConfig)).toBe(true);
  });

  it('should reject inconsistent RSI bands', () => {
    const config = loadConfig({ RSI_OVERSOLD: '80' });

    expect(() => buildSignalConfig(config)).toThrow(ConfigurationError);
    expect(() => buildSignalConfig(config)).toThrow(
      'Invalid signal configuration: rsiOversold: must be below rsiOverbought (80 >= 70)'
    );
  });
});

describe('getConfigSummary()', () => {
  it('should report whether the API key is set without revealing it', () => {
    const summary = getConfigSummary(loadConfig({ ALPHA_VANTAGE_API_KEY: 'test-secret' }));

    expect(summary['providers']).toEqual({ alphaVantage: 'configured', minRequestIntervalMs: 12000 });
    expect(JSON.stringify(summary)).not.toContain('test-secret');
  });
});
