import type { AnswerMap, QuestionSpec } from '../types/questions';

interface SubsectionShape {
  name: string;
  questions: number;
}

interface CategoryShape {
  category: string;
  subsections: SubsectionShape[];
}

export const TIERS_4 = [
  { upTo: 29, title: 'Tier A', text: 'Text A' },
  { upTo: 90, title: 'Tier B', text: 'Text B' },
  { upTo: 110, title: 'Tier C', text: 'Text C' },
  { upTo: null, title: 'Tier D', text: 'Text D' }
];

export const TIERS_5 = [
  { upTo: 59, title: 'Tier A', text: 'Text A' },
  { upTo: null, title: 'Tier B', text: 'Text B' }
];

/** Raw configuration in the shape of src/data/assessment.json, with every subsection on one page. */
export const makeRawAssessment = (shape: CategoryShape[]) => ({
  title: 'Test assessment',
  introduction: 'An assessment used in tests.',
  categories: shape.map((c) => ({
    name: c.category,
    subsections: c.subsections.map((s) => ({
      name: s.name,
      questions: Array.from({ length: s.questions }, (_, i) => `${s.name} question ${i + 1}`)
    }))
  })),
  pages: [shape.flatMap((c) => c.subsections.map((s) => s.name))],
  scales: {
    '4': { labels: ['Never', 'Rarely', 'Sometimes', 'Often'], tiers: TIERS_4 },
    '5': { labels: ['Never', 'Rarely', 'Sometimes', 'Often', 'Always'], tiers: TIERS_5 }
  }
});

export const answerAll = (questions: readonly QuestionSpec[], score: number): AnswerMap =>
  new Map(questions.map((q) => [q.key, score]));

export const answerEach = (questions: readonly QuestionSpec[], scores: number[]): AnswerMap =>
  new Map(questions.map((q, i) => [q.key, scores[i]]));

// 1x1 transparent PNG
export const TINY_PNG_BASE64 =
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==';

export const tinyPng = (): Uint8Array => Uint8Array.from(atob(TINY_PNG_BASE64), (c) => c.charCodeAt(0));
