import React, { useMemo } from 'react';
import { useTranslation } from 'react-i18next';
import { useNavigate, useParams } from 'react-router-dom';
import { useAppState } from '../../context/AppStateContext';
import type { QuestionSpec } from '../../types/questions';
import { questionsForPage, subsectionKey } from '../../utils/questionCatalog';
import { ratingOptions } from '../../utils/rating';
import ProgressBar from '../ProgressBar';
import RatingSelect from '../RatingSelect';
import PageNotFound from '../NotFound';
import Footer from '../Footer';

interface QuestionGroup {
  category: string;
  subsection: string;
  questions: QuestionSpec[];
}

const Questionnaire: React.FC = () => {
  const { page } = useParams();
  const navigate = useNavigate();
  const { t } = useTranslation('common');
  const { assessment, scale, session, setAnswer, submit, score } = useAppState();

  const pageNumber = Number(page);
  const pageCount = assessment.pages.length;
  const validPage = Number.isInteger(pageNumber) && pageNumber >= 1 && pageNumber <= pageCount;

  const questions = useMemo(
    () => (validPage ? questionsForPage(assessment, pageNumber - 1) : []),
    [assessment, pageNumber, validPage]
  );
  const options = useMemo(() => ratingOptions(scale), [scale]);

  // Group the page's questions under their category and subsection headings
  const groups = useMemo(() => {
    const bySubsection = new Map<string, QuestionGroup>();
    for (const q of questions) {
      const key = subsectionKey(q.category, q.subsection);
      const group: QuestionGroup = bySubsection.get(key) ?? { category: q.category, subsection: q.subsection, questions: [] };
      group.questions.push(q);
      bySubsection.set(key, group);
    }
    return [...bySubsection.values()];
  }, [questions]);

  if (!validPage) return <PageNotFound />;

  const categoryNames = [...new Set(questions.map((q) => q.category))].join(', ');
  const isLastPage = pageNumber === pageCount;

  const onSubmit = () => {
    submit();
    navigate('/results');
  };

  return (
    <div className='panel questionnaire-panel'>
      <h2>{t('questionnaire.pageTitle', { page: pageNumber, category: categoryNames })}</h2>

      <form className='question-list' onSubmit={(e) => e.preventDefault()}>
        {groups.map((group) => (
          <fieldset key={subsectionKey(group.category, group.subsection)} className='subsection'>
            <legend><h3>{group.subsection}</h3></legend>
            {group.questions.map((q) => (
              <RatingSelect
                key={q.id}
                id={q.id}
                label={q.text}
                value={session.answers.get(q.key)}
                options={options}
                placeholder={t('questionnaire.selectAnswer')}
                onChange={(value) => setAnswer(q, value)}
              />
            ))}
          </fieldset>
        ))}
      </form>

      <div className='page-actions'>
        {pageNumber > 1 && (
          <button className='btn-secondary' onClick={() => navigate(`/assessment/${pageNumber - 1}`)}>
            {t('questionnaire.back')}
          </button>
        )}
        {isLastPage ? (
          <button className='primary-btn' onClick={onSubmit}>
            {t('questionnaire.submit')}
          </button>
        ) : (
          <button className='primary-btn' onClick={() => navigate(`/assessment/${pageNumber + 1}`)}>
            {t('questionnaire.next')}
          </button>
        )}
      </div>

      <ProgressBar
        percent={score.completionPercentage}
        label={t('questionnaire.progress', {
          answered: score.completionCount,
          total: score.completionTotal,
          percent: score.completionPercentage
        })}
      />
      <Footer />
    </div>
  );
};

export default Questionnaire;
