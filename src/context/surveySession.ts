import type { AnswerMap, QuestionSpec } from '../types/questions';

export interface SurveySession {
  id: string;
  startedAt: string; // ISO timestamp
  answers: AnswerMap;
  submitted: boolean;
}

let sessionCounter = 0;

export const createSurveySession = (now: Date = new Date()): SurveySession => {
  sessionCounter += 1;
  return {
    id: `session-${now.getTime()}-${sessionCounter}`,
    startedAt: now.toISOString(),
    answers: new Map(),
    submitted: false
  };
};

/**
 * Returns a new session with the answer stored, replacing any earlier answer
 * to the same question. `rating` has already been through `parseRating`.
 */
export const recordAnswer = (
  session: SurveySession,
  question: Pick<QuestionSpec, 'key'>,
  rating: number
): SurveySession => {
  const answers = new Map(session.answers);
  answers.set(question.key, rating);
  return { ...session, answers };
};

export const submitSession = (session: SurveySession): SurveySession => ({ ...session, submitted: true });
