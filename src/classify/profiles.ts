/**
 * Crawl Profiles
 *
 * A profile bundles the relevance rules, classification rules, buffer
 * radius table and provider language of one survey flavour. Profiles are
 * data (JSON files beside this module) validated on load, so every survey
 * runs through the same engine.
 *
 * @module classify/profiles
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { ClassificationRule } from './classifier.js';
import type { RelevanceRules } from './relevance.js';
import marketJson from './profiles/market.json';
import communityJson from './profiles/community.json';

// ============================================================================
// Schemas
// ============================================================================

const CategoryHintSchema = z.object({
  nameIncludes: z.array(z.string().min(1)).min(1),
  rejectTypes: z.array(z.string()).optional(),
});

const RelevanceRulesSchema = z.object({
  irrelevantTypes: z.array(z.string()),
  irrelevantNamePatterns: z.array(z.string().min(1)),
  scopedTypes: z.record(z.array(z.string())).optional(),
  categoryHints: z.record(z.array(CategoryHintSchema)).optional(),
}) satisfies z.ZodType<RelevanceRules>;

const ClassificationRuleSchema = z.object({
  category: z.string().min(1),
  subCategory: z.string().optional(),
  nameIncludes: z.array(z.string().min(1)).optional(),
  nameExcludes: z.array(z.string().min(1)).optional(),
  typesInclude: z.array(z.string()).optional(),
  result: z.string().min(1).optional(),
}) satisfies z.ZodType<ClassificationRule>;

export const CrawlProfileSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  /** Provider language code */
  language: z.string().min(2).optional(),
  relevance: RelevanceRulesSchema,
  classification: z.array(ClassificationRuleSchema),
  /** category -> sub_category -> buffer radius in metres */
  bufferRadii: z.record(z.record(z.number().int().positive())),
});

export type CrawlProfile = z.infer<typeof CrawlProfileSchema>;

// ============================================================================
// Built-in Profiles
// ============================================================================

export const PROFILE_NAMES = ['market', 'community'] as const;

export type ProfileName = (typeof PROFILE_NAMES)[number];

const PROFILES: Record<ProfileName, CrawlProfile> = {
  market: CrawlProfileSchema.parse(marketJson),
  community: CrawlProfileSchema.parse(communityJson),
};

export function isProfileName(name: string): name is ProfileName {
  return PROFILE_NAMES.some((profile) => profile === name);
}

/**
 * Look up a built-in profile by name.
 *
 * @throws ConfigurationError for unknown names
 */
export function getProfile(name: string): CrawlProfile {
  if (!isProfileName(name)) {
    throw new ConfigurationError(`Unknown profile: ${name}`, [
      `Available profiles: ${PROFILE_NAMES.join(', ')}`,
    ]);
  }
  return PROFILES[name];
}

/**
 * Buffer radius for a classified place.
 *
 * Profile table first, then the query's radius hint, otherwise absent.
 */
export function bufferRadiusFor(
  profile: CrawlProfile,
  category: string,
  subCategory: string,
  radiusHint?: number
): number | undefined {
  return profile.bufferRadii[category]?.[subCategory] ?? radiusHint;
}
