export type RatingMax = 4 | 5;

export interface QuestionSpec {
  id: string; // DOM-safe ordinal id (q1, q2, ...)
  key: string; // Lookup key derived from category + subsection + text
  category: string;
  subsection: string;
  text: string;
}

export interface SubsectionDefinition {
  name: string;
  questions: readonly QuestionSpec[];
}

export interface CategoryDefinition {
  name: string;
  subsections: readonly SubsectionDefinition[];
}

export interface InterpretationTier {
  upTo: number | null; // Inclusive upper bound on the total score; null = unbounded
  title: string;
  text: string;
}

export interface RatingScale {
  max: RatingMax;
  labels: readonly string[]; // labels[i] describes rating i + 1
  tiers: readonly InterpretationTier[];
}

export interface AssessmentDefinition {
  title: string;
  introduction: string;
  categories: readonly CategoryDefinition[];
  questions: readonly QuestionSpec[]; // Flattened in configuration order
  pages: readonly (readonly string[])[]; // Subsection names shown on each questionnaire page
  scales: Readonly<Record<RatingMax, RatingScale>>;
}

/** Question key -> selected rating. At most one answer per question. */
export type AnswerMap = ReadonlyMap<string, number>;
