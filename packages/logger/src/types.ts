/**
 * @fileoverview Type definitions for the suite logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity that will be written.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/signals.log'
 * };
 * ```
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Machine-readable JSON lines instead of colorized pretty-print.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /** Also write to this file when set */
  filePath?: string;

  /**
   * Console output toggle.
   * @default true
   */
  console?: boolean;
}

/**
 * Context fields commonly attached to child loggers.
 *
 * @example
 * ```typescript
 * const providerLogger = logger.child({ component: 'market-data', provider: 'yahoo' });
 * ```
 */
export interface ChildLoggerContext {
  /** Component identifier (e.g. 'market-data', 'bot') */
  component?: string;

  /** Instrument symbol (e.g. 'GLD') */
  symbol?: string;

  /** Chart timeframe (e.g. '1d') */
  timeframe?: string;

  /** Data provider id */
  provider?: string;

  /** Operation name */
  operation?: string;

  [key: string]: unknown;
}

/**
 * Winston's logger interface, re-exported so callers need not depend on winston.
 */
export type Logger = WinstonLogger;
