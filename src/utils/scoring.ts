import type { AnswerMap, QuestionSpec } from '../types/questions';
import { InvalidRatingError } from './errors';
import { isValidRating } from './rating';
import { subsectionKey } from './questionCatalog';

export interface ScopeTotals {
  raw: number; // points earned
  max: number; // questionCount x maxRating
  percentage: number; // 0-100
  answered: number;
  questionCount: number;
}

export interface CategoryTotals extends ScopeTotals {
  category: string;
}

export interface SubsectionTotals extends ScopeTotals {
  category: string;
  subsection: string;
}

export interface ScoreResult {
  totalScore: number;
  maxScore: number;
  percentage: number;
  perCategory: ReadonlyMap<string, CategoryTotals>; // keyed by category name
  perSubsection: ReadonlyMap<string, SubsectionTotals>; // keyed by subsectionKey()
  completionCount: number;
  completionTotal: number;
  completionPercentage: number;
}

/**
 * round(raw / max * 100), except that a non-zero raw score never reads as 0%.
 */
export const toPercentage = (raw: number, max: number): number => {
  if (max <= 0 || raw <= 0) return 0;
  return Math.max(1, Math.round((raw / max) * 100));
};

const emptyTotals = (): ScopeTotals => ({ raw: 0, max: 0, percentage: 0, answered: 0, questionCount: 0 });

const addQuestion = (totals: ScopeTotals, maxRating: number, score: number | undefined) => {
  totals.questionCount += 1;
  totals.max += maxRating;
  if (score !== undefined) {
    totals.raw += score;
    totals.answered += 1;
  }
};

/**
 * Aggregates answers over the full question catalog in a single pass.
 * Unanswered questions add nothing to the raw score but still count toward
 * the maximum, so the denominator only depends on configuration.
 */
export const computeScore = (
  questions: readonly QuestionSpec[],
  answers: AnswerMap,
  maxRating: number
): ScoreResult => {
  const perCategory = new Map<string, CategoryTotals>();
  const perSubsection = new Map<string, SubsectionTotals>();
  let totalScore = 0;
  let completionCount = 0;

  for (const q of questions) {
    const score = answers.get(q.key);
    if (score !== undefined && !isValidRating(score, maxRating)) {
      throw new InvalidRatingError(score, maxRating);
    }

    let category = perCategory.get(q.category);
    if (!category) {
      category = { category: q.category, ...emptyTotals() };
      perCategory.set(q.category, category);
    }
    const subKey = subsectionKey(q.category, q.subsection);
    let subsection = perSubsection.get(subKey);
    if (!subsection) {
      subsection = { category: q.category, subsection: q.subsection, ...emptyTotals() };
      perSubsection.set(subKey, subsection);
    }

    addQuestion(category, maxRating, score);
    addQuestion(subsection, maxRating, score);
    if (score !== undefined) {
      totalScore += score;
      completionCount += 1;
    }
  }

  for (const totals of [...perCategory.values(), ...perSubsection.values()]) {
    totals.percentage = toPercentage(totals.raw, totals.max);
  }

  const maxScore = questions.length * maxRating;
  return {
    totalScore,
    maxScore,
    percentage: toPercentage(totalScore, maxScore),
    perCategory,
    perSubsection,
    completionCount,
    completionTotal: questions.length,
    completionPercentage: questions.length === 0 ? 0 : Math.round((completionCount / questions.length) * 100)
  };
};

/** Subsection totals of one category, in configuration order. */
export const subsectionsOf = (score: ScoreResult, category: string): SubsectionTotals[] =>
  [...score.perSubsection.values()].filter((s) => s.category === category);
