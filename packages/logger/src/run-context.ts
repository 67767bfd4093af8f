/**
 * @fileoverview Analysis run context using AsyncLocalStorage.
 *
 * Each analysis run gets an id that is attached to every log line written
 * while the run is in progress, including lines from provider fallbacks.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RunContext {
  /** Unique run identifier (UUID v4) */
  run_id: string;

  [key: string]: unknown;
}

const runContextStorage = new AsyncLocalStorage<RunContext>();

export function generateRunId(): string {
  return randomUUID();
}

export function getRunContext(): RunContext | undefined {
  return runContextStorage.getStore();
}

/**
 * @returns The active run id, or undefined outside a run
 */
export function getRunId(): string | undefined {
  return getRunContext()?.run_id;
}

/**
 * Executes `fn` inside a new run context. The id propagates through every
 * awaited call made by `fn`.
 *
 * @param fn - Work to perform
 * @param runId - Id to use; a new UUID when omitted
 * @param additionalContext - Extra fields stored alongside the id
 *
 * @example
 * ```typescript
 * await withRunContext(async () => {
 *   logger.info('Fetching bars'); // carries run_id
 *   return bot.runSingleAnalysis(ChartTimeframe.OneDay);
 * }, undefined, { timeframe: '1d' });
 * ```
 */
export async function withRunContext<T>(
  fn: () => Promise<T> | T,
  runId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: RunContext = {
    run_id: runId || generateRunId(),
    ...additionalContext,
  };

  return runContextStorage.run(context, fn);
}
