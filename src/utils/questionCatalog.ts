import { z } from 'zod';
import type {
  AssessmentDefinition,
  CategoryDefinition,
  InterpretationTier,
  QuestionSpec,
  RatingMax,
  RatingScale
} from '../types/questions';
import { ConfigurationError } from './errors';

const tierSchema = z.object({
  upTo: z.number().int().nullable(),
  title: z.string().min(1),
  text: z.string().min(1)
});

const scaleSchema = z.object({
  labels: z.array(z.string().min(1)),
  tiers: z.array(tierSchema).min(1)
});

const rawAssessmentSchema = z.object({
  title: z.string().min(1),
  introduction: z.string(),
  categories: z.array(
    z.object({
      name: z.string().min(1),
      subsections: z.array(
        z.object({
          name: z.string().min(1),
          questions: z.array(z.string().min(1))
        })
      )
    })
  ),
  pages: z.array(z.array(z.string())),
  scales: z.object({
    '4': scaleSchema,
    '5': scaleSchema
  })
});

export type RawAssessment = z.infer<typeof rawAssessmentSchema>;

/**
 * Lookup key for a question. Identity is the (category, subsection, text)
 * triple, so the key encodes all three without ambiguity.
 */
export const questionKey = (category: string, subsection: string, text: string): string =>
  JSON.stringify([category, subsection, text]);

export const subsectionKey = (category: string, subsection: string): string =>
  JSON.stringify([category, subsection]);

const checkTiers = (max: RatingMax, tiers: readonly InterpretationTier[], issues: string[]) => {
  let previous = -Infinity;
  tiers.forEach((tier, index) => {
    const isLast = index === tiers.length - 1;
    if (tier.upTo === null) {
      if (!isLast) issues.push(`scale ${max}: only the last tier may be unbounded ("${tier.title}")`);
      return;
    }
    if (isLast) issues.push(`scale ${max}: the last tier must be unbounded ("${tier.title}")`);
    if (tier.upTo <= previous) issues.push(`scale ${max}: tier bounds must ascend ("${tier.title}")`);
    previous = tier.upTo;
  });
};

const buildScale = (max: RatingMax, raw: RawAssessment['scales']['4'], issues: string[]): RatingScale => {
  if (raw.labels.length !== max) {
    issues.push(`scale ${max}: expected ${max} labels, found ${raw.labels.length}`);
  }
  checkTiers(max, raw.tiers, issues);
  return { max, labels: [...raw.labels], tiers: raw.tiers.map((t) => ({ ...t })) };
};

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
};

/**
 * Validates the static assessment configuration and builds the immutable
 * question catalog. Every integrity problem is collected and reported in one
 * ConfigurationError.
 */
export const parseAssessmentDefinition = (input: unknown): AssessmentDefinition => {
  const parsed = rawAssessmentSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Malformed assessment configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const raw = parsed.data;
  const issues: string[] = [];

  if (raw.categories.length === 0) issues.push('at least one category is required');

  const questions: QuestionSpec[] = [];
  const seenKeys = new Set<string>();
  const subsectionNames = new Set<string>();

  const categories: CategoryDefinition[] = raw.categories.map((category) => {
    if (category.subsections.length === 0) {
      issues.push(`category "${category.name}" has no subsections`);
    }
    const seenInCategory = new Set<string>();

    const subsections = category.subsections.map((subsection) => {
      // Pages refer to subsections by name, so names are unique across categories.
      if (seenInCategory.has(subsection.name)) {
        issues.push(`subsection "${subsection.name}" appears twice in "${category.name}"`);
      } else if (subsectionNames.has(subsection.name)) {
        issues.push(`subsection "${subsection.name}" appears in more than one category`);
      }
      seenInCategory.add(subsection.name);
      subsectionNames.add(subsection.name);

      if (subsection.questions.length === 0) {
        issues.push(`subsection "${subsection.name}" in "${category.name}" has no questions`);
      }

      const specs = subsection.questions.map((text) => {
        const key = questionKey(category.name, subsection.name, text);
        if (seenKeys.has(key)) {
          issues.push(`duplicate question in "${subsection.name}": "${text}"`);
        }
        seenKeys.add(key);
        const spec: QuestionSpec = {
          id: `q${questions.length + 1}`,
          key,
          category: category.name,
          subsection: subsection.name,
          text
        };
        questions.push(spec);
        return spec;
      });

      return { name: subsection.name, questions: specs };
    });

    return { name: category.name, subsections };
  });

  // Every subsection is shown on exactly one questionnaire page.
  const placed = new Map<string, number>();
  raw.pages.forEach((page, pageIndex) => {
    if (page.length === 0) issues.push(`page ${pageIndex + 1} lists no subsections`);
    page.forEach((name) => {
      if (!subsectionNames.has(name)) {
        issues.push(`page ${pageIndex + 1} lists unknown subsection "${name}"`);
      } else if (placed.has(name)) {
        issues.push(`subsection "${name}" is listed on more than one page`);
      }
      placed.set(name, pageIndex);
    });
  });
  if (raw.pages.length === 0) issues.push('at least one questionnaire page is required');
  subsectionNames.forEach((name) => {
    if (!placed.has(name)) issues.push(`subsection "${name}" is not listed on any page`);
  });

  const scales: Record<RatingMax, RatingScale> = {
    4: buildScale(4, raw.scales['4'], issues),
    5: buildScale(5, raw.scales['5'], issues)
  };

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid assessment configuration', issues);
  }

  return deepFreeze({
    title: raw.title,
    introduction: raw.introduction,
    categories,
    questions,
    pages: raw.pages.map((page) => [...page]),
    scales
  });
};

/** Questions belonging to the subsections listed on one questionnaire page, in configuration order. */
export const questionsForPage = (assessment: AssessmentDefinition, pageIndex: number): QuestionSpec[] => {
  const names = new Set(assessment.pages[pageIndex] ?? []);
  return assessment.questions.filter((q) => names.has(q.subsection));
};
