import { describe, it, expect } from 'vitest';
import assessmentData from '../data/assessment.json';
import { parseAssessmentDefinition, questionKey, questionsForPage } from './questionCatalog';
import { ConfigurationError } from './errors';
import { makeRawAssessment } from '../test-utils/fixtures';

const issuesOf = (input: unknown): string[] => {
  try {
    parseAssessmentDefinition(input);
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  return [];
};

const twoCategories = () =>
  makeRawAssessment([
    { category: 'Allyship', subsections: [{ name: 'Speak out', questions: 2 }] },
    { category: 'Leadership', subsections: [{ name: 'Sponsor others', questions: 1 }] }
  ]);

describe('parseAssessmentDefinition', () => {
  it('loads the bundled assessment', () => {
    const assessment = parseAssessmentDefinition(assessmentData);

    expect(assessment.questions).toHaveLength(30);
    expect(assessment.categories).toHaveLength(1);
    expect(assessment.categories[0].subsections).toHaveLength(10);
    expect(assessment.pages).toHaveLength(2);
    expect(questionsForPage(assessment, 0)).toHaveLength(15);
    expect(questionsForPage(assessment, 1)).toHaveLength(15);
    expect(assessment.scales[4].labels).toEqual(['Never', 'Rarely', 'Sometimes', 'Often']);
    expect(assessment.scales[5].labels).toHaveLength(5);
  });

  it('numbers questions in configuration order and keys them by category, subsection and text', () => {
    const assessment = parseAssessmentDefinition(twoCategories());

    expect(assessment.questions.map((q) => q.id)).toEqual(['q1', 'q2', 'q3']);
    expect(assessment.questions[2]).toEqual({
      id: 'q3',
      key: questionKey('Leadership', 'Sponsor others', 'Sponsor others question 1'),
      category: 'Leadership',
      subsection: 'Sponsor others',
      text: 'Sponsor others question 1'
    });
  });

  it('returns a frozen catalog', () => {
    const assessment = parseAssessmentDefinition(twoCategories());

    expect(Object.isFrozen(assessment)).toBe(true);
    expect(Object.isFrozen(assessment.questions)).toBe(true);
    expect(Object.isFrozen(assessment.questions[0])).toBe(true);
  });

  it('returns no questions for a page that does not exist', () => {
    const assessment = parseAssessmentDefinition(twoCategories());

    expect(questionsForPage(assessment, 3)).toEqual([]);
  });

  it('rejects input of the wrong shape', () => {
    expect(() => parseAssessmentDefinition({ title: 'No categories' })).toThrow(
      /^Malformed assessment configuration: /
    );
  });

  it('rejects an empty category list', () => {
    expect(issuesOf({ ...twoCategories(), categories: [], pages: [['Speak out']] })).toContain(
      'at least one category is required'
    );
  });

  it('rejects a subsection without questions', () => {
    const raw = makeRawAssessment([{ category: 'Allyship', subsections: [{ name: 'Speak out', questions: 0 }] }]);

    expect(issuesOf(raw)).toEqual(['subsection "Speak out" in "Allyship" has no questions']);
  });

  it('rejects a duplicated question within a subsection', () => {
    const raw = {
      ...twoCategories(),
      categories: [{ name: 'Allyship', subsections: [{ name: 'Speak out', questions: ['Same', 'Same'] }] }],
      pages: [['Speak out']]
    };

    expect(issuesOf(raw)).toEqual(['duplicate question in "Speak out": "Same"']);
  });

  it('rejects a subsection name used by two categories', () => {
    const raw = makeRawAssessment([
      { category: 'Allyship', subsections: [{ name: 'Speak out', questions: 1 }] },
      { category: 'Leadership', subsections: [{ name: 'Speak out', questions: 1 }] }
    ]);

    expect(issuesOf(raw)).toContain('subsection "Speak out" appears in more than one category');
  });

  it('requires every subsection on exactly one page', () => {
    expect(issuesOf({ ...twoCategories(), pages: [['Speak out']] })).toEqual([
      'subsection "Sponsor others" is not listed on any page'
    ]);
    expect(issuesOf({ ...twoCategories(), pages: [['Speak out', 'Sponsor others'], ['Speak out']] })).toEqual([
      'subsection "Speak out" is listed on more than one page'
    ]);
    expect(issuesOf({ ...twoCategories(), pages: [['Speak out', 'Sponsor others', 'Listen']] })).toEqual([
      'page 1 lists unknown subsection "Listen"'
    ]);
  });

  it('checks label counts and tier ordering of each scale', () => {
    const raw = twoCategories();
    const broken = {
      ...raw,
      scales: {
        '4': {
          labels: ['Never', 'Often'],
          tiers: [
            { upTo: 50, title: 'Low', text: 'Low text' },
            { upTo: 20, title: 'Lower', text: 'Lower text' },
            { upTo: null, title: 'High', text: 'High text' }
          ]
        },
        '5': { labels: raw.scales['5'].labels, tiers: [{ upTo: 10, title: 'Capped', text: 'Capped text' }] }
      }
    };

    expect(issuesOf(broken)).toEqual([
      'scale 4: expected 4 labels, found 2',
      'scale 4: tier bounds must ascend ("Lower")',
      'scale 5: the last tier must be unbounded ("Capped")'
    ]);
  });

  it('reports every integrity problem in one error', () => {
    const raw = { ...twoCategories(), pages: [] };

    expect(() => parseAssessmentDefinition(raw)).toThrow(
      'Invalid assessment configuration: at least one questionnaire page is required; ' +
        'subsection "Speak out" is not listed on any page; ' +
        'subsection "Sponsor others" is not listed on any page'
    );
  });
});
