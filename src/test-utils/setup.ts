// i18n, logging and DOM cleanup shared by every test file
import { afterEach } from 'vitest';
import { cleanup } from '@testing-library/react';

import '../i18n/config';
import { getLogger } from '../utils/logger';

getLogger().setLevel('silent');

afterEach(() => {
  cleanup();
});
