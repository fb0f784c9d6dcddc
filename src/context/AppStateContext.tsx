import React, { createContext, useCallback, useContext, useMemo, useState } from 'react';
import { ASSESSMENT, RATING_SCALE } from '../config/assessment';
import type { AssessmentDefinition, QuestionSpec, RatingScale } from '../types/questions';
import { InvalidRatingError } from '../utils/errors';
import { getLogger } from '../utils/logger';
import { parseRating } from '../utils/rating';
import { computeScore, ScoreResult } from '../utils/scoring';
import { getVisitCount, recordVisit } from '../utils/visitCounter';
import { createSurveySession, recordAnswer, submitSession, SurveySession } from './surveySession';

interface AppStateContextValue {
  assessment: AssessmentDefinition;
  scale: RatingScale;
  session: SurveySession;
  setAnswer: (question: QuestionSpec, value: string | number) => void;
  submit: () => void;
  startOver: () => void;
  score: ScoreResult;
  visits: number;
  recordPageView: () => void;
}

export type { AppStateContextValue };

const AppStateContext = createContext<AppStateContextValue | undefined>(undefined);

const log = getLogger().child({ module: 'session' });

interface AppStateProviderProps {
  children: React.ReactNode;
  assessment?: AssessmentDefinition;
  scale?: RatingScale;
}

/**
 * Owns the respondent's session for as long as the app is open. Nothing is
 * persisted: a reload or "Start over" begins a fresh session.
 */
export const AppStateProvider: React.FC<AppStateProviderProps> = ({
  children,
  assessment = ASSESSMENT,
  scale = RATING_SCALE
}) => {
  const [session, setSession] = useState<SurveySession>(() => createSurveySession());
  const [visits, setVisits] = useState<number>(() => getVisitCount());

  const setAnswer = useCallback(
    (question: QuestionSpec, value: string | number) => {
      let rating: number;
      try {
        rating = parseRating(value, scale);
      } catch (error) {
        if (!(error instanceof InvalidRatingError)) throw error;
        log.warn('Rejected answer outside the rating scale', { question: question.id, value });
        return;
      }
      setSession((prev) => recordAnswer(prev, question, rating));
    },
    [scale]
  );

  const submit = useCallback(() => {
    setSession((prev) => submitSession(prev));
    log.info('Assessment submitted');
  }, []);

  const startOver = useCallback(() => {
    setSession(createSurveySession());
    log.info('Session restarted');
  }, []);

  const recordPageView = useCallback(() => {
    setVisits(recordVisit());
  }, []);

  const score = useMemo(
    () => computeScore(assessment.questions, session.answers, scale.max),
    [assessment, session.answers, scale]
  );

  const value: AppStateContextValue = {
    assessment,
    scale,
    session,
    setAnswer,
    submit,
    startOver,
    score,
    visits,
    recordPageView
  };

  return <AppStateContext.Provider value={value}>{children}</AppStateContext.Provider>;
};

export const useAppState = (): AppStateContextValue => {
  const ctx = useContext(AppStateContext);
  if (!ctx) throw new Error('useAppState must be used within AppStateProvider');
  return ctx;
};
