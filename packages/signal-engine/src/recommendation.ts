import type { SignalDirection } from '@bullion/contracts';

export const ERROR_RECOMMENDATION = 'Unable to generate signal due to data issues';

const STRONG_CONFIDENCE = 7.0;
const MODERATE_CONFIDENCE = 5.0;

/**
 * Human-readable recommendation, tiered by confidence.
 *
 * @example
 * ```typescript
 * buildRecommendation('BUY', 7.24); // "STRONG BUY - High confidence signal (Score: 7.2/10)"
 * ```
 */
export function buildRecommendation(direction: SignalDirection, confidence: number): string {
  const score = `(Score: ${confidence.toFixed(1)}/10)`;

  if (direction === 'HOLD') {
    return `HOLD - No clear trading opportunity ${score}`;
  }
  if (confidence >= STRONG_CONFIDENCE) {
    return `STRONG ${direction} - High confidence signal ${score}`;
  }
  if (confidence >= MODERATE_CONFIDENCE) {
    return `${direction} - Moderate confidence signal ${score}`;
  }
  return `WEAK ${direction} - Low confidence signal ${score}`;
}
