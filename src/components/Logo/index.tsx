import { useState } from 'react';
import { useTranslation } from 'react-i18next';
import { APP_CONFIG } from '../../config/appConfig';
import { getLogger } from '../../utils/logger';

const LOGO_WIDTH = 200;

const Logo = () => {
  const { t } = useTranslation('common');
  const [missing, setMissing] = useState(false);

  if (missing) {
    return <p className='warning'>{t('logo.missing')}</p>;
  }

  return (
    <img
      className='logo'
      src={APP_CONFIG.logoUrl}
      width={LOGO_WIDTH}
      alt={t('logo.alt')}
      onError={() => {
        getLogger().warn('Logo image not found', { url: APP_CONFIG.logoUrl });
        setMissing(true);
      }}
    />
  );
};

export default Logo;
