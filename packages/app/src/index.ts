/**
 * @fileoverview Main entry point for @bullion/app.
 */

export { GoldSignalBot, calculateTimeframeConsensus, calculatePerformanceMetrics } from './bot.js';
export type {
  BarSource,
  GoldSignalBotOptions,
  TimeframeConsensus,
  MultiTimeframeResult,
  PerformanceMetrics,
  BacktestReport,
  RealtimeOptions,
} from './bot.js';
export { SessionLog } from './session-log.js';
export type { SignalRecord, SessionSummary } from './session-log.js';
export { loadConfig, buildSignalConfig, getConfigSummary, configSchema, envMapping } from './config/index.js';
export type { Config } from './config/index.js';
export { SignalFormatter } from './formatters/signal-formatter.js';
export { createProgram, createRuntime } from './program.js';
export type { CliOptions, CliIO, ProgramOptions, Runtime } from './program.js';
