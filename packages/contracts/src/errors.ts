/**
 * @fileoverview Error taxonomy for the bullion-signals suite.
 *
 * Every error carries a machine-readable code, an optional structured data
 * payload and the ISO timestamp at which it was created. The signal core
 * never lets these escape its boundary; they are converted into ERROR
 * signals or `Result` failures instead.
 *
 * @module @bullion/contracts/errors
 */

/**
 * Base error class for all suite errors.
 *
 * @invariant code is a non-empty string
 * @invariant timestamp is a valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new BullionError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class BullionError extends Error {
  /** Machine-readable error code (e.g. 'INDICATOR_ERROR'). */
  readonly code: string;

  /** Structured context for debugging. */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created. */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'BullionError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();

    Object.setPrototypeOf(this, new.target.prototype);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Raised by the indicator engine when a series is missing, malformed or too
 * short to yield a defined "current" value.
 *
 * @example
 * ```typescript
 * throw new IndicatorError('RSI requires more than 14 values', {
 *   indicator: 'rsi',
 *   required: 15,
 *   received: 10,
 * });
 * ```
 */
export class IndicatorError extends BullionError {
  constructor(
    message: string,
    data: { indicator: string; required?: number; received?: number; [key: string]: unknown }
  ) {
    super('INDICATOR_ERROR', message, data);
    this.name = 'IndicatorError';
  }
}

/**
 * Describes a failed signal generation. Carried on ERROR signals rather than
 * thrown.
 */
export class SignalError extends BullionError {
  constructor(message: string, data?: { cause?: string; [key: string]: unknown }) {
    super('SIGNAL_ERROR', message, data);
    this.name = 'SignalError';
  }
}

/**
 * Raised when a bar series violates an OHLCV or ordering invariant.
 */
export class InvalidBarSeriesError extends BullionError {
  constructor(message: string, data: { reason: string; index?: number; [key: string]: unknown }) {
    super('INVALID_BAR_SERIES', message, data);
    this.name = 'InvalidBarSeriesError';
  }
}

/**
 * Raised when a market-data provider fails to deliver bars.
 */
export class ProviderError extends BullionError {
  constructor(message: string, data: { provider: string; [key: string]: unknown }) {
    super('PROVIDER_ERROR', message, data);
    this.name = 'ProviderError';
  }
}

/**
 * Raised when a provider reports throttling. Callers should back off.
 */
export class ProviderRateLimitError extends BullionError {
  constructor(message: string, data: { provider: string; retryAfter?: number; [key: string]: unknown }) {
    super('PROVIDER_RATE_LIMIT', message, data);
    this.name = 'ProviderRateLimitError';
  }
}

/**
 * Raised when configuration values fail validation.
 */
export class ConfigurationError extends BullionError {
  constructor(message: string, data?: { issues?: string[]; [key: string]: unknown }) {
    super('CONFIGURATION_ERROR', message, data);
    this.name = 'ConfigurationError';
  }
}

export function isBullionError(error: unknown): error is BullionError {
  return error instanceof BullionError;
}

export function isIndicatorError(error: unknown): error is IndicatorError {
  return error instanceof IndicatorError;
}

export function isInvalidBarSeriesError(error: unknown): error is InvalidBarSeriesError {
  return error instanceof InvalidBarSeriesError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

export function isProviderRateLimitError(error: unknown): error is ProviderRateLimitError {
  return error instanceof ProviderRateLimitError;
}

/**
 * Extracts a human-readable message from any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
