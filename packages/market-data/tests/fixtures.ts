/**
 * @fileoverview Shared helpers for market data tests: an axios instance
 * backed by an in-process adapter, a log capture and bar builders.
 */

import { Writable } from 'node:stream';
import axios, { AxiosError, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { vi } from 'vitest';
import winston from 'winston';
import type { MarketBar } from '@bullion/contracts';
import type { Logger } from '@bullion/logger';

export type HttpHandler = (config: InternalAxiosRequestConfig) => { status: number; data: unknown };

/**
 * Creates a real axios instance whose requests are answered by `handler`.
 * Non-2xx statuses reject with an AxiosError, as the HTTP adapter does.
 */
export function createHttpClient(handler: HttpHandler) {
  const adapter = vi.fn(async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const { status, data } = handler(config);
    const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        undefined,
        response
      );
    }
    return response;
  });

  const client: AxiosInstance = axios.create({ adapter });
  return { client, adapter };
}

export function captureLines(logger: Logger): Array<Record<string, unknown>> {
  const lines: Array<Record<string, unknown>> = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      for (const line of chunk.toString().split('\n')) {
        if (line.trim()) {
          lines.push(JSON.parse(line));
        }
      }
      callback();
    },
  });
  logger.add(new winston.transports.Stream({ stream }));
  return lines;
}

export const flush = () => new Promise((resolve) => setTimeout(resolve, 20));

const BASE_TIME = new Date('2025-01-15T14:30:00Z').getTime();

/**
 * `count` flat bars at 5-minute spacing.
 */
export function createFlatBars(count: number, close = 200): MarketBar[] {
  return Array.from({ length: count }, (_, i) => ({
    timestamp: new Date(BASE_TIME + i * 5 * 60 * 1000).toISOString(),
    open: close,
    high: close + 0.5,
    low: close - 0.5,
    close,
    volume: 1000,
  }));
}
