import React, { useCallback, useState } from 'react';
import { useTranslation } from 'react-i18next';
import { Link, useNavigate } from 'react-router-dom';
import { APP_CONFIG } from '../../config/appConfig';
import { useAppState } from '../../context/AppStateContext';
import { downloadStaticGuide, exportResultsPdf } from '../../utils/exportReport';
import { selectInterpretation } from '../../utils/interpretation';
import { getLogger } from '../../utils/logger';
import { DEFAULT_LAYOUT } from '../../utils/reportLayout';
import { subsectionsOf } from '../../utils/scoring';
import ProgressBar from '../ProgressBar';
import SubsectionBarChart from '../SubsectionBarChart';
import { Toast, ToastType } from '../Toast';
import Footer from '../Footer';

interface ToastState {
  message: string;
  type: ToastType;
}

const Report: React.FC = () => {
  const { t } = useTranslation('common');
  const navigate = useNavigate();
  const { assessment, scale, session, score, startOver } = useAppState();
  const [toast, setToast] = useState<ToastState | null>(null);
  const [generating, setGenerating] = useState(false);

  const closeToast = useCallback(() => setToast(null), []);

  if (!session.submitted) {
    return (
      <div className='panel report-panel'>
        <p>{t('report.notSubmitted')}</p>
        <Link to='/assessment/1'>{t('report.continueAssessment')}</Link>
        <Footer />
      </div>
    );
  }

  const tier = selectInterpretation(score.totalScore, scale.tiers);
  const categories = [...score.perCategory.values()];

  const onDownloadGuide = async () => {
    const found = await downloadStaticGuide(APP_CONFIG.guideUrl);
    if (!found) setToast({ message: t('report.guideNotFound'), type: 'error' });
  };

  const onDownloadResults = async () => {
    setGenerating(true);
    try {
      const warnings = await exportResultsPdf({
        title: assessment.title,
        score,
        tiers: scale.tiers,
        logoUrl: APP_CONFIG.logoUrl,
        layout: {
          ...DEFAULT_LAYOUT,
          imagesPerPage: APP_CONFIG.reportImagesPerPage,
          maxImagePages: APP_CONFIG.reportImagePages
        }
      });
      if (warnings.length > 0) {
        setToast({ message: warnings.map((w) => t(`report.warnings.${w}`)).join(' '), type: 'warning' });
      }
    } catch (error) {
      getLogger().error('Results document could not be generated', {
        error: error instanceof Error ? error.message : String(error)
      });
      setToast({ message: t('report.exportError'), type: 'error' });
    } finally {
      setGenerating(false);
    }
  };

  const onStartOver = () => {
    startOver();
    navigate('/');
  };

  return (
    <div className='panel report-panel'>
      <h2>{t('report.complete')}</h2>

      <section className='report-categories-section'>
        {categories.map((c) => (
          <div key={c.category} className='category-detail-card'>
            <p className='category-name'>
              <strong>{t('report.scoreLine', { category: c.category, raw: c.raw, max: c.max })}</strong>
            </p>
            <ProgressBar percent={c.percentage} />
          </div>
        ))}
      </section>

      <section className='report-charts-section'>
        <h3>{t('report.chartsTitle')}</h3>
        {categories.map((c) => (
          <div key={c.category}>
            <h3>{c.category}</h3>
            <SubsectionBarChart category={c.category} subsections={subsectionsOf(score, c.category)} />
          </div>
        ))}
      </section>

      {tier && (
        <section className='report-interpretation'>
          <h3>{t('report.interpretationTitle')}</h3>
          <h4>{tier.title}</h4>
          {tier.text.split(/\n\s*\n/).map((paragraph) => (
            <p key={paragraph}>{paragraph}</p>
          ))}
        </section>
      )}

      <div className='export-actions'>
        <button className='primary-btn' onClick={() => void onDownloadGuide()}>
          {t('report.understand')}
        </button>
        <button className='primary-btn' disabled={generating} onClick={() => void onDownloadResults()}>
          {generating ? t('report.generating') : t('report.download')}
        </button>
        <button className='btn-secondary' onClick={onStartOver}>
          {t('report.startOver')}
        </button>
      </div>

      {toast && <Toast message={toast.message} type={toast.type} onClose={closeToast} />}
      <Footer />
    </div>
  );
};

export default Report;
