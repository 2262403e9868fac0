import type { QueryResult } from './vector-index';

export type GateDecision =
  | { decision: 'proceed'; context: QueryResult; topScore: number }
  | { decision: 'fallback'; topScore: number | null };

/**
 * Only the best score is compared: one strong match is enough, several weak
 * ones never add up.
 */
export function decide(result: QueryResult, threshold: number): GateDecision {
  const topScore = result.length > 0 ? result[0].score : null;
  if (topScore !== null && topScore >= threshold) {
    return { decision: 'proceed', context: result, topScore };
  }
  return { decision: 'fallback', topScore };
}
