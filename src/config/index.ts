/**
 * Configuration Module
 *
 * Loads and validates environment variables for the gridscout crawler.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { ConfigurationError } from '../errors/index.js';

/** Values that people leave in .env files instead of a real key */
const PLACEHOLDER_KEYS = ['your_api_key_here', 'api_key_here', 'placeholder'];

// Environment schema with optional values and defaults
const envSchema = z.object({
  GOOGLE_MAPS_API_KEY: z.string().optional(),

  // Data directory for checkpoints and locks
  GRIDSCOUT_DATA_DIR: z.string().optional(),

  // Crawl tuning
  API_RATE_LIMIT: z.coerce.number().positive().max(100).default(10),
  SEARCH_LANGUAGE: z.string().min(2).optional(),
  MAX_PAGES: z.coerce.number().int().min(1).max(3).default(3),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

/**
 * Resolved application configuration
 */
export interface Config {
  nodeEnv: Env['NODE_ENV'];
  isProduction: boolean;
  isTest: boolean;
  /** Google Maps Platform key, if set */
  apiKey: string | undefined;
  /** Root directory for crawl state */
  dataDir: string;
  /** Provider calls per second */
  rateLimit: number;
  /** Provider language code */
  language: string | undefined;
  /** Result pages followed per zone/keyword */
  maxPages: number;
}

/**
 * Parse an environment map into a Config.
 *
 * @param env - Environment variables (usually process.env)
 * @throws ConfigurationError listing every invalid variable
 */
export function parseEnv(env: NodeJS.ProcessEnv): Config {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const details = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigurationError('Invalid environment variables', details);
  }

  const parsed = result.data;
  const dataDir = parsed.GRIDSCOUT_DATA_DIR;

  return {
    nodeEnv: parsed.NODE_ENV,
    isProduction: parsed.NODE_ENV === 'production',
    isTest: parsed.NODE_ENV === 'test',
    apiKey: parsed.GOOGLE_MAPS_API_KEY || undefined,
    dataDir: dataDir
      ? dataDir.startsWith('~')
        ? join(homedir(), dataDir.slice(1))
        : resolve(dataDir)
      : join(homedir(), '.gridscout'),
    rateLimit: parsed.API_RATE_LIMIT,
    language: parsed.SEARCH_LANGUAGE,
    maxPages: parsed.MAX_PAGES,
  };
}

let cached: Config | undefined;

/**
 * Get the process-wide configuration, parsing process.env on first use.
 */
export function getConfig(): Config {
  if (!cached) {
    cached = parseEnv(process.env);
  }
  return cached;
}

/**
 * Drop the cached configuration so the next getConfig() re-reads process.env.
 */
export function resetConfig(): void {
  cached = undefined;
}

/**
 * Get the API key or throw if it is missing or still a placeholder.
 */
export function requireApiKey(config: Config = getConfig()): string {
  const key = config.apiKey?.trim();
  if (!key || PLACEHOLDER_KEYS.includes(key.toLowerCase())) {
    throw new ConfigurationError(
      'Missing required API key: GOOGLE_MAPS_API_KEY. Please set it in your .env file.'
    );
  }
  return key;
}

// Re-export cost configuration
export * from './costs.js';
