/**
 * @fileoverview Custom winston formats: secret redaction, standard fields
 * with run id injection, and a pretty console layout.
 */

import { format } from 'winston';
import { getRunId } from './run-context.js';

/**
 * Field names whose values must never reach a transport.
 * The Alpha Vantage key is the main candidate, but tokens and passwords
 * arriving through provider errors are covered as well.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /apikey/i,
  /token/i,
  /authorization/i,
];

const REDACTED = '[REDACTED]';

const CORE_FIELDS = ['level', 'message', 'timestamp', 'label'];

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with sensitive keys replaced at any depth.
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item));
  }

  if (value instanceof Error) {
    return value;
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    redacted[key] = isSensitiveKey(key) ? REDACTED : redactSensitiveFields(nested);
  }
  return redacted;
}

/**
 * Winston format that redacts sensitive metadata. Must run first in the chain.
 *
 * @example
 * ```typescript
 * logger.info('Requesting bars', { apikey: 'test-secret', symbol: 'GLD' });
 * // {"level":"info","message":"Requesting bars","apikey":"[REDACTED]","symbol":"GLD"}
 * ```
 */
export const redactSecrets = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.includes(key)) {
      continue;
    }
    info[key] = isSensitiveKey(key) ? REDACTED : redactSensitiveFields(info[key]);
  }
  return info;
});

/**
 * Timestamp, error stacks and the active run id.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const runId = getRunId();
    if (runId && !info['run_id']) {
      info['run_id'] = runId;
    }
    return info;
  })()
);

/**
 * Human-readable console layout:
 * `[2025-09-29T12:34:56.789Z] info: Signal generated component=bot timeframe=1d run_id=…`
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, symbol, timeframe, run_id, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (symbol) context.push(`symbol=${String(symbol)}`);
    if (timeframe) context.push(`timeframe=${String(timeframe)}`);
    if (run_id) context.push(`run_id=${String(run_id)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (['level', 'message', 'timestamp', 'stack', 'splat'].includes(key)) {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    if (info['stack']) {
      return `${baseMsg}\n${String(info['stack'])}`;
    }

    return baseMsg;
  })
);
