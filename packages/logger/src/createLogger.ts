/**
 * @fileoverview Logger factory.
 * Creates configured winston loggers with secret redaction, run id injection
 * and console/file transports.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { redactSecrets, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: false });
 * logger.info('Analysis started', { symbol: 'GLD', timeframe: '1d' });
 * ```
 *
 * @example
 * ```typescript
 * // Silent logger with a file transport, as used by tests
 * const logger = createLogger({ level: 'debug', console: false, filePath: './logs/run.log' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
  } = config;

  // Order matters: redact before anything can serialize the metadata
  const logFormat = format.combine(redactSecrets(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
        // Keep stdout free for rendered signals and --json output
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    // File output is always JSON lines
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: format.combine(redactSecrets(), standardFields, format.json()),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  if (transports.length === 0) {
    // winston complains when it has nowhere to write
    transports.push(new winston.transports.Console({ level, silent: true }));
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    // Global handlers decide when to exit
    exitOnError: false,
  });
}

/**
 * Creates a child logger whose entries always carry `context`.
 *
 * @example
 * ```typescript
 * const providerLogger = createChildLogger(logger, { component: 'market-data', provider: 'yahoo' });
 * providerLogger.warn('Falling back to demo data');
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
