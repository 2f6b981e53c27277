/**
 * Relevance filtering, classification and scoring.
 *
 * @module classify
 */

export { isRelevant, containsPhrase, type RelevanceRules, type CategoryHint } from './relevance.js';
export { refine, type ClassificationRule } from './classifier.js';
export { popularityScore, REVIEW_SATURATION } from './scorer.js';
export {
  getProfile,
  isProfileName,
  bufferRadiusFor,
  CrawlProfileSchema,
  PROFILE_NAMES,
  type CrawlProfile,
  type ProfileName,
} from './profiles.js';
