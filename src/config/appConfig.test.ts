import { describe, it, expect } from 'vitest';
import { parseAppConfig } from './appConfig';
import { ConfigurationError } from '../utils/errors';

describe('parseAppConfig', () => {
  it('falls back to defaults for unset and blank keys', () => {
    expect(parseAppConfig({ VITE_LOGO_URL: '', MODE: 'test' })).toEqual({
      ratingScaleMax: 4,
      logoUrl: '/logo.png',
      guideUrl: '/allyship_guide.pdf',
      logLevel: 'info',
      reportImagesPerPage: 2,
      reportImagePages: 3
    });
  });

  it('reads every setting', () => {
    const config = parseAppConfig({
      VITE_RATING_SCALE_MAX: '5',
      VITE_LOGO_URL: '/brand/logo.png',
      VITE_GUIDE_URL: '/docs/guide.pdf',
      VITE_LOG_LEVEL: 'debug',
      VITE_REPORT_IMAGES_PER_PAGE: '3',
      VITE_REPORT_IMAGE_PAGES: '1'
    });

    expect(config).toEqual({
      ratingScaleMax: 5,
      logoUrl: '/brand/logo.png',
      guideUrl: '/docs/guide.pdf',
      logLevel: 'debug',
      reportImagesPerPage: 3,
      reportImagePages: 1
    });
  });

  it('rejects an unsupported rating scale', () => {
    expect(() => parseAppConfig({ VITE_RATING_SCALE_MAX: '7' })).toThrow(ConfigurationError);
  });

  it('names each invalid key', () => {
    try {
      parseAppConfig({ VITE_LOG_LEVEL: 'loud', VITE_REPORT_IMAGE_PAGES: '0' });
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      expect(error.issues.map((issue) => issue.split(':')[0])).toEqual([
        'VITE_LOG_LEVEL',
        'VITE_REPORT_IMAGE_PAGES'
      ]);
    }
  });
});
