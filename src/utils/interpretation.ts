import type { InterpretationTier } from '../types/questions';

/**
 * Picks the interpretive text for a total score. Tiers are ordered by their
 * inclusive upper bound; the first tier the score does not exceed wins.
 */
export const selectInterpretation = (
  totalScore: number,
  tiers: readonly InterpretationTier[]
): InterpretationTier | undefined =>
  tiers.find((tier) => tier.upTo === null || totalScore <= tier.upTo);
