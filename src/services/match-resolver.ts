import { UNMATCHED, type MatchCandidate, type MatchResult } from '../types/index.js';

/**
 * Picks between the rule and AI answers for one field.
 *
 * The higher confidence wins and an exact tie goes to the rule. A winner below
 * `minAcceptConfidence` leaves the field unmatched whichever matcher produced
 * it: a blank field is cheaper than wrong data on a real application.
 */
export function resolveMatch(
  fieldId: string,
  rule: MatchCandidate,
  ai: MatchCandidate,
  minAcceptConfidence: number
): MatchResult {
  const ruleScore = rule.attribute ? rule.confidence : -1;
  const aiScore = ai.attribute ? ai.confidence : -1;

  const winner =
    ruleScore < 0 && aiScore < 0
      ? null
      : ruleScore >= aiScore
        ? { ...rule, source: 'rule' as const }
        : { ...ai, source: 'ai' as const };

  if (!winner || !winner.attribute) {
    return { fieldId, attribute: UNMATCHED, confidence: 0, source: 'none' };
  }

  if (winner.confidence <= 0 || winner.confidence < minAcceptConfidence) {
    return {
      fieldId,
      attribute: UNMATCHED,
      confidence: 0,
      source: 'none',
      candidate: { attribute: winner.attribute, confidence: winner.confidence, source: winner.source },
    };
  }

  return {
    fieldId,
    attribute: winner.attribute,
    confidence: winner.confidence,
    source: winner.source,
  };
}
