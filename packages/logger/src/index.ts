/**
 * @fileoverview Public API exports for @bullion/logger
 * Structured logging and process-level error handling for bullion-signals
 */

// Core logger creation
export { createLogger, createChildLogger } from './createLogger.js';

// Global error handlers
export { attachGlobalHandlers } from './errorHandler.js';

// Run context management
export { generateRunId, getRunContext, getRunId, withRunContext } from './run-context.js';

// Performance timing utilities
export { startTimer, measureSync, measureAsync } from './perf-timer.js';

// Formats (exposed for custom transports)
export { redactSecrets, redactSensitiveFields } from './formats.js';

// Type exports
export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
export type { RunContext } from './run-context.js';
export type { PerfTimer } from './perf-timer.js';
