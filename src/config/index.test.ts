/**
 * Tests for configuration module
 *
 * @module config/index.test
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { parseEnv, requireApiKey, getConfig, resetConfig } from './index.js';
import { ConfigurationError } from '../errors/index.js';

describe('config', () => {
  afterEach(() => {
    resetConfig();
  });

  describe('parseEnv', () => {
    it('applies defaults for an empty environment', () => {
      const config = parseEnv({});
      expect(config.nodeEnv).toBe('development');
      expect(config.rateLimit).toBe(10);
      expect(config.maxPages).toBe(3);
      expect(config.language).toBeUndefined();
      expect(config.apiKey).toBeUndefined();
      expect(config.dataDir).toBe(join(homedir(), '.gridscout'));
    });

    it('uses custom data directory when specified', () => {
      const config = parseEnv({ GRIDSCOUT_DATA_DIR: '/custom/path' });
      expect(config.dataDir).toBe('/custom/path');
    });

    it('expands ~ in the data directory', () => {
      const config = parseEnv({ GRIDSCOUT_DATA_DIR: '~/surveys' });
      expect(config.dataDir).toBe(join(homedir(), 'surveys'));
    });

    it('coerces numeric variables', () => {
      const config = parseEnv({ API_RATE_LIMIT: '8', MAX_PAGES: '2', SEARCH_LANGUAGE: 'id' });
      expect(config.rateLimit).toBe(8);
      expect(config.maxPages).toBe(2);
      expect(config.language).toBe('id');
    });

    it('sets environment flags', () => {
      const config = parseEnv({ NODE_ENV: 'test' });
      expect(config.isTest).toBe(true);
      expect(config.isProduction).toBe(false);
    });

    it('rejects an out-of-range page cap with details', () => {
      expect.assertions(2);
      try {
        parseEnv({ MAX_PAGES: '5' });
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          expect(error.details[0]).toMatch(/^MAX_PAGES:/);
        }
      }
    });

    it('rejects a non-positive rate limit', () => {
      expect(() => parseEnv({ API_RATE_LIMIT: '0' })).toThrow(ConfigurationError);
    });
  });

  describe('requireApiKey', () => {
    it('returns the key when present', () => {
      expect(requireApiKey(parseEnv({ GOOGLE_MAPS_API_KEY: 'test-key' }))).toBe('test-key');
    });

    it('throws for a missing key', () => {
      expect(() => requireApiKey(parseEnv({}))).toThrow(/Missing required API key/);
    });

    it('throws for a placeholder key', () => {
      expect(() => requireApiKey(parseEnv({ GOOGLE_MAPS_API_KEY: 'YOUR_API_KEY_HERE' }))).toThrow(
        ConfigurationError
      );
    });
  });

  describe('getConfig', () => {
    it('caches until reset', () => {
      const first = getConfig();
      expect(getConfig()).toBe(first);
      resetConfig();
      expect(getConfig()).not.toBe(first);
    });
  });
});
