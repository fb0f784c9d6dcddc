import React from 'react';
import { useTranslation } from 'react-i18next';
import { useAppState } from '../../context/AppStateContext';

const Footer: React.FC = () => {
  const { t } = useTranslation('common');
  const { visits } = useAppState();

  return (
    <footer className='app-footer'>
      <div className='footer-text'>{t('footer.visits', { count: visits })}</div>
    </footer>
  );
};

export default Footer;
