/**
 * @fileoverview Tests for error classes and serialization.
 */

import { describe, it, expect } from 'vitest';
import {
  BullionError,
  IndicatorError,
  SignalError,
  InvalidBarSeriesError,
  ProviderError,
  ProviderRateLimitError,
  ConfigurationError,
  isBullionError,
  isIndicatorError,
  isProviderRateLimitError,
  describeError,
} from '../src/errors.js';

describe('BullionError', () => {
  it('should create error with code and message', () => {
    const error = new BullionError('TEST_CODE', 'Test message');

    expect(error.name).toBe('BullionError');
    expect(error.code).toBe('TEST_CODE');
    expect(error.message).toBe('Test message');
    expect(error.timestamp).toBeDefined();
    expect(error.stack).toBeDefined();
  });

  it('should include optional data', () => {
    const data = { foo: 'bar', count: 42 };
    const error = new BullionError('TEST_CODE', 'Test message', data);

    expect(error.data).toEqual(data);
  });

  it('should have valid ISO timestamp', () => {
    const error = new BullionError('TEST_CODE', 'Test message');
    const timestamp = new Date(error.timestamp);

    expect(timestamp.toISOString()).toBe(error.timestamp);
  });

  it('should serialize to JSON correctly', () => {
    const error = new BullionError('TEST_CODE', 'Test message', { key: 'value' });
    const json = error.toJSON();

    expect(json['name']).toBe('BullionError');
    expect(json['code']).toBe('TEST_CODE');
    expect(json['message']).toBe('Test message');
    expect(json['data']).toEqual({ key: 'value' });
    expect(json['timestamp']).toBe(error.timestamp);
  });

  it('should be JSON stringifiable', () => {
    const error = new BullionError('TEST_CODE', 'Test message', { key: 'value' });
    const parsed = JSON.parse(JSON.stringify(error));

    expect(parsed.name).toBe('BullionError');
    expect(parsed.code).toBe('TEST_CODE');
    expect(parsed.message).toBe('Test message');
  });
});

describe('IndicatorError', () => {
  it('should carry indicator context', () => {
    const error = new IndicatorError('RSI needs more data', {
      indicator: 'rsi',
      required: 15,
      received: 10,
    });

    expect(error.name).toBe('IndicatorError');
    expect(error.code).toBe('INDICATOR_ERROR');
    expect(error.data?.['indicator']).toBe('rsi');
    expect(error.data?.['required']).toBe(15);
    expect(error).toBeInstanceOf(BullionError);
    expect(error).toBeInstanceOf(Error);
  });
});

describe('subclass codes', () => {
  it.each([
    [new SignalError('failed'), 'SignalError', 'SIGNAL_ERROR'],
    [new InvalidBarSeriesError('bad', { reason: 'empty' }), 'InvalidBarSeriesError', 'INVALID_BAR_SERIES'],
    [new ProviderError('down', { provider: 'yahoo' }), 'ProviderError', 'PROVIDER_ERROR'],
    [new ProviderRateLimitError('slow down', { provider: 'alpha-vantage', retryAfter: 60 }), 'ProviderRateLimitError', 'PROVIDER_RATE_LIMIT'],
    [new ConfigurationError('invalid'), 'ConfigurationError', 'CONFIGURATION_ERROR'],
  ])('%s has name and code', (error, name, code) => {
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
  });

  it('should serialize rate limit data', () => {
    const error = new ProviderRateLimitError('Rate limit exceeded', {
      provider: 'alpha-vantage',
      retryAfter: 60,
    });
    const parsed = JSON.parse(JSON.stringify(error.toJSON()));

    expect(parsed.code).toBe('PROVIDER_RATE_LIMIT');
    expect(parsed.data.provider).toBe('alpha-vantage');
    expect(parsed.data.retryAfter).toBe(60);
  });
});

describe('type guards', () => {
  it('should identify suite errors', () => {
    expect(isBullionError(new IndicatorError('x', { indicator: 'ema' }))).toBe(true);
    expect(isBullionError(new Error('plain'))).toBe(false);
    expect(isBullionError('string')).toBe(false);
    expect(isBullionError(null)).toBe(false);
  });

  it('should discriminate subclasses', () => {
    const indicator = new IndicatorError('x', { indicator: 'atr' });
    const rateLimit = new ProviderRateLimitError('y', { provider: 'yahoo' });

    expect(isIndicatorError(indicator)).toBe(true);
    expect(isIndicatorError(rateLimit)).toBe(false);
    expect(isProviderRateLimitError(rateLimit)).toBe(true);
    expect(isProviderRateLimitError(indicator)).toBe(false);
  });
});

describe('describeError', () => {
  it('should use the message of Error instances', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
  });

  it('should stringify other values', () => {
    expect(describeError(42)).toBe('42');
    expect(describeError(undefined)).toBe('undefined');
  });
});
