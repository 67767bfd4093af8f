/**
 * @fileoverview Helpers shared by the HTTP providers.
 *
 * @module @bullion/market-data/http
 */

import axios from 'axios';
import { ProviderError, ProviderRateLimitError, isBullionError } from '@bullion/contracts';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Maps a failed request to the provider error taxonomy. Suite errors pass
 * through untouched; HTTP 429 becomes a rate-limit error.
 */
export function toProviderError(provider: string, label: string, error: unknown): Error {
  if (isBullionError(error)) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === 429) {
      return new ProviderRateLimitError(`${label} rate limit exceeded`, { provider, status });
    }
    const detail = status ? `HTTP ${status}` : error.message;
    return new ProviderError(`${label} request failed: ${detail}`, { provider, status });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError(`${label} request failed: ${message}`, { provider });
}
