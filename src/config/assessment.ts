import assessmentData from '../data/assessment.json';
import type { AssessmentDefinition, RatingScale } from '../types/questions';
import { parseAssessmentDefinition } from '../utils/questionCatalog';
import { APP_CONFIG } from './appConfig';

// Validated once at startup; a broken configuration stops the app from loading.
export const ASSESSMENT: AssessmentDefinition = parseAssessmentDefinition(assessmentData);

export const RATING_SCALE: RatingScale = ASSESSMENT.scales[APP_CONFIG.ratingScaleMax];
