import { describe, it, expect } from 'vitest';
import { selectInterpretation } from './interpretation';
import { TIERS_4, TIERS_5 } from '../test-utils/fixtures';

describe('selectInterpretation', () => {
  it.each([
    [0, 'Tier A'],
    [29, 'Tier A'],
    [30, 'Tier B'],
    [90, 'Tier B'],
    [91, 'Tier C'],
    [110, 'Tier C'],
    [111, 'Tier D'],
    [120, 'Tier D']
  ])('places a total of %i in %s', (total, title) => {
    expect(selectInterpretation(total, TIERS_4)?.title).toBe(title);
  });

  it('uses the tier list it is given', () => {
    expect(selectInterpretation(59, TIERS_5)?.title).toBe('Tier A');
    expect(selectInterpretation(60, TIERS_5)?.title).toBe('Tier B');
  });

  it('returns undefined when no tier is configured', () => {
    expect(selectInterpretation(10, [])).toBeUndefined();
  });
});
