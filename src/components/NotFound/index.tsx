import { Link } from 'react-router-dom';
import { useTranslation } from 'react-i18next';

const PageNotFound = () => {
  const { t } = useTranslation('common');

  return (
    <div className='wrapper'>
      <section>
        {t('notFound.message')}
        {' '}
        <Link to='/'>{t('notFound.home')}</Link>
        {' '}
        {t('notFound.suffix')}
      </section>
    </div>
  );
};

export default PageNotFound;
