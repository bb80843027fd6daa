/**
 * Composite score computation
 * composite = Σ dimension × weight, weights summing to 1.0
 */

import { ValidationError } from "../errors";
import { DIMENSIONS, type DimensionScores, type Score, type ScoringWeights } from "../model";

export const WEIGHT_SUM_TOLERANCE = 1e-6;

export const DEFAULT_WEIGHTS: ScoringWeights = Object.freeze({
  relevance: 0.3,
  importance: 0.3,
  timeliness: 0.2,
  reliability: 0.2,
});

function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

/**
 * Throws ValidationError unless every weight is in [0, 1] and they sum to 1.0
 */
export function validateWeights(weights: ScoringWeights): void {
  let sum = 0;
  for (const dimension of DIMENSIONS) {
    const weight = weights[dimension];
    if (!isUnitInterval(weight)) {
      throw new ValidationError(`Weight for ${dimension} must be in [0, 1], got ${weight}`);
    }
    sum += weight;
  }

  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ValidationError(`Scoring weights must sum to 1.0, got ${sum}`);
  }
}

/**
 * Weighted sum of the dimensions. Weights are divided by their sum, so a set
 * that is within tolerance of 1.0 still yields a composite in [0, 1].
 */
export function computeComposite(dimensions: DimensionScores, weights: ScoringWeights): number {
  let weighted = 0;
  let weightSum = 0;
  for (const dimension of DIMENSIONS) {
    weighted += dimensions[dimension] * weights[dimension];
    weightSum += weights[dimension];
  }
  // Only rounding in the last place can push the quotient past 1
  return Math.min(1, weighted / weightSum);
}

export function freezeScore(score: Score): Score {
  return Object.freeze({
    itemId: score.itemId,
    dimensions: Object.freeze({ ...score.dimensions }),
    composite: score.composite,
    weightsUsed: Object.freeze({ ...score.weightsUsed }),
    scoredAt: score.scoredAt,
  });
}

export function createScore(
  itemId: string,
  dimensions: DimensionScores,
  weights: ScoringWeights,
  scoredAt: Date = new Date()
): Score {
  return freezeScore({
    itemId,
    dimensions,
    composite: computeComposite(dimensions, weights),
    weightsUsed: weights,
    scoredAt: scoredAt.toISOString(),
  });
}
