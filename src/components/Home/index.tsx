import { useNavigate } from 'react-router-dom';
import { useTranslation } from 'react-i18next';
import { useAppState } from '../../context/AppStateContext';
import { ratingOptions } from '../../utils/rating';
import Footer from '../Footer';

const Home = () => {
  const navigate = useNavigate();
  const { t } = useTranslation('common');
  const { assessment, scale } = useAppState();

  const legend = ratingOptions(scale)
    .map((o) => `${o.value} = ${o.label}`)
    .join(' | ');

  return (
    <section className='home-panel'>
      <header className='home-header'>
        <h1>{assessment.title}</h1>
        <p className='subtitle'>{assessment.introduction}</p>
      </header>
      <main className='home-main'>
        <h3 className='rating-legend'>{t('home.ratingScale', { scale: legend })}</h3>
        <button className='primary-btn' onClick={() => navigate('/assessment/1')}>
          {t('home.start')}
        </button>
        <div className='home-notes'>
          <span className='note-text'>{t('home.privacyNote')}</span>
        </div>
      </main>
      <Footer />
    </section>
  );
};

export default Home;
