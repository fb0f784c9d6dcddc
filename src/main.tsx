import { createRoot } from 'react-dom/client';

import App from './components/App';
import { APP_CONFIG } from './config/appConfig';
import './i18n/config';
import { getLogger } from './utils/logger';

getLogger().setLevel(APP_CONFIG.logLevel);

const container = document.getElementById('root');
if (container) {
  const root = createRoot(container);
  root.render(<App />);
} else {
  throw new Error('Root container not found');
}
