import { z } from 'zod';
import type { RatingMax } from '../types/questions';
import { ConfigurationError } from '../utils/errors';
import { LOG_LEVELS, type LogLevel } from '../utils/logger';

export interface AppConfig {
  ratingScaleMax: RatingMax;
  logoUrl: string;
  guideUrl: string;
  logLevel: LogLevel;
  reportImagesPerPage: number;
  reportImagePages: number;
}

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  VITE_RATING_SCALE_MAX: z.enum(['4', '5']).default('4'),
  VITE_LOGO_URL: z.string().min(1).default('/logo.png'),
  VITE_GUIDE_URL: z.string().min(1).default('/allyship_guide.pdf'),
  VITE_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  VITE_REPORT_IMAGES_PER_PAGE: positiveInt(2),
  VITE_REPORT_IMAGE_PAGES: positiveInt(3)
});

/**
 * Reads the deployment configuration from Vite environment variables.
 * Empty strings count as unset so `.env` files can leave a key blank.
 */
export const parseAppConfig = (env: Record<string, unknown>): AppConfig => {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== '' && value !== undefined)
  );
  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid environment configuration',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    ratingScaleMax: parsed.VITE_RATING_SCALE_MAX === '5' ? 5 : 4,
    logoUrl: parsed.VITE_LOGO_URL,
    guideUrl: parsed.VITE_GUIDE_URL,
    logLevel: parsed.VITE_LOG_LEVEL,
    reportImagesPerPage: parsed.VITE_REPORT_IMAGES_PER_PAGE,
    reportImagePages: parsed.VITE_REPORT_IMAGE_PAGES
  };
};

export const APP_CONFIG: AppConfig = parseAppConfig(import.meta.env);
