/**
 * @fileoverview Global handlers for uncaught exceptions and unhandled rejections.
 * Errors are logged with full stack traces, then the process exits once the
 * logger has flushed.
 */

import type { Logger } from './types.js';

/** Upper bound on waiting for transports to flush before a forced exit. */
const FLUSH_TIMEOUT_MS = 3000;

let attachedDetach: (() => void) | null = null;

/**
 * Attaches process-level error handlers. Fail-fast: after logging an
 * uncaught exception or unhandled rejection the process exits with code 1.
 *
 * Calling it again while handlers are attached logs a warning and returns
 * the existing detach function.
 *
 * @param logger - Logger used for the fatal entries
 * @returns Function that removes the handlers again
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): () => void {
  if (attachedDetach) {
    logger.warn('Global error handlers already attached, skipping');
    return attachedDetach;
  }

  const uncaughtExceptionHandler = (error: Error) => {
    logger.error('Uncaught exception detected - process will exit', {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, 1);
  };

  const unhandledRejectionHandler = (reason: unknown) => {
    const errorInfo =
      reason instanceof Error
        ? { name: reason.name, message: reason.message, stack: reason.stack }
        : { message: String(reason) };

    logger.error('Unhandled promise rejection detected - process will exit', {
      error: errorInfo,
      event: 'unhandledRejection',
      fatal: true,
    });
    gracefulExit(logger, 1);
  };

  // Warnings are informational only
  const warningHandler = (warning: Error) => {
    logger.warn('Process warning emitted', {
      warning: { name: warning.name, message: warning.message },
      event: 'warning',
    });
  };

  process.on('uncaughtException', uncaughtExceptionHandler);
  process.on('unhandledRejection', unhandledRejectionHandler);
  process.on('warning', warningHandler);

  const detach = () => {
    process.off('uncaughtException', uncaughtExceptionHandler);
    process.off('unhandledRejection', unhandledRejectionHandler);
    process.off('warning', warningHandler);
    attachedDetach = null;
  };
  attachedDetach = detach;

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });

  return detach;
}

/**
 * Ends the logger and exits once it reports 'finish', or after the flush
 * timeout, whichever comes first.
 */
function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
