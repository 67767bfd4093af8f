/**
 * @fileoverview Weighted multi-factor vote.
 */

import { SIGNAL_DIRECTIONS } from '@bullion/contracts';
import type { DirectionScores, FactorJudgments, SignalDirection } from '@bullion/contracts';
import type { FactorName, FactorWeights } from '../types.js';

const MAX_CONFIDENCE = 10.0;

/** Factors that carry a directional vote. Volume only confirms. */
const DIRECTIONAL_FACTORS: readonly FactorName[] = ['trend', 'rsi', 'priceStructure'];

const FACTORS: readonly FactorName[] = ['trend', 'rsi', 'volume', 'priceStructure'];

export interface CompositeDecision {
  direction: SignalDirection;
  /** Winning bucket score, kept even when the direction is forced to HOLD */
  strength: number;
  /** 0-10 */
  confidence: number;
  /** 0-1 */
  consensus: number;
  scores: DirectionScores;
}

/**
 * Accumulates weighted strengths into BUY/SELL/HOLD buckets.
 * NEUTRAL judgments add to no bucket.
 */
export function scoreDirections(components: FactorJudgments, weights: FactorWeights): DirectionScores {
  const scores: Record<SignalDirection, number> = { BUY: 0, SELL: 0, HOLD: 0 };

  for (const factor of FACTORS) {
    const judgment = components[factor];
    if (judgment.direction === 'NEUTRAL') {
      continue;
    }
    scores[judgment.direction] += judgment.strength * weights[factor];
  }

  return scores;
}

/**
 * Share of the directional factors voting with the largest group.
 */
export function calculateConsensus(components: FactorJudgments): number {
  const counts = new Map<string, number>();
  for (const factor of DIRECTIONAL_FACTORS) {
    const direction = components[factor].direction;
    counts.set(direction, (counts.get(direction) ?? 0) + 1);
  }

  const maxCount = Math.max(...counts.values());
  return maxCount / DIRECTIONAL_FACTORS.length;
}

/**
 * Picks the highest bucket. Ties go to the earlier of BUY, SELL, HOLD.
 */
function winningDirection(scores: DirectionScores): SignalDirection {
  let winner: SignalDirection = 'BUY';
  for (const direction of SIGNAL_DIRECTIONS) {
    if (scores[direction] > scores[winner]) {
      winner = direction;
    }
  }
  return winner;
}

/**
 * Combines the four factor judgments into one decision.
 *
 * A BUY or SELL whose score falls below `activationThreshold`, or is not
 * positive at all, becomes HOLD but keeps its score as the strength.
 *
 * @example
 * ```typescript
 * const decision = composeDecision(components, DEFAULT_WEIGHTS, 1.0);
 * decision.confidence; // min(strength * consensus, 10)
 * ```
 */
export function composeDecision(
  components: FactorJudgments,
  weights: FactorWeights,
  activationThreshold: number
): CompositeDecision {
  const scores = scoreDirections(components, weights);
  const winner = winningDirection(scores);
  const strength = scores[winner];

  const inactive = strength <= 0 || strength < activationThreshold;
  const direction: SignalDirection = winner !== 'HOLD' && inactive ? 'HOLD' : winner;

  const consensus = calculateConsensus(components);
  const confidence = Math.min(strength * consensus, MAX_CONFIDENCE);

  return { direction, strength, confidence, consensus, scores };
}
