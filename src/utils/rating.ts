import type { RatingScale } from '../types/questions';
import { InvalidRatingError } from './errors';

export const isValidRating = (value: number, max: number): boolean =>
  Number.isInteger(value) && value >= 1 && value <= max;

/**
 * Converts a widget value into a rating. Accepts numbers and numeric strings;
 * anything outside 1..scale.max is rejected rather than clamped.
 */
export const parseRating = (value: unknown, scale: Pick<RatingScale, 'max'>): number => {
  const numeric =
    typeof value === 'number' ? value : typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;
  if (!isValidRating(numeric, scale.max)) {
    throw new InvalidRatingError(value, scale.max);
  }
  return numeric;
};

export const ratingOptions = (scale: RatingScale): { value: number; label: string }[] =>
  scale.labels.map((label, index) => ({ value: index + 1, label }));
