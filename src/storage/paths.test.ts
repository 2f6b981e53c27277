/**
 * Path Resolution Utilities Tests
 *
 * @module storage/paths.test
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import * as path from 'node:path';
import { resetConfig } from '../config/index.js';
import {
  getDataDir,
  getCrawlsDir,
  getCrawlDir,
  getCheckpointPath,
  getLockPath,
  validateIdSecurity,
} from './paths.js';

describe('storage/paths', () => {
  const originalEnvVar = process.env.GRIDSCOUT_DATA_DIR;

  afterEach(() => {
    if (originalEnvVar === undefined) {
      delete process.env.GRIDSCOUT_DATA_DIR;
    } else {
      process.env.GRIDSCOUT_DATA_DIR = originalEnvVar;
    }
    resetConfig();
  });

  describe('getDataDir', () => {
    it('should use GRIDSCOUT_DATA_DIR env var when set', () => {
      process.env.GRIDSCOUT_DATA_DIR = '/custom/data/dir';
      resetConfig();

      expect(getDataDir()).toBe('/custom/data/dir');
    });
  });

  describe('crawl paths', () => {
    it('should nest crawl state under crawls/', () => {
      expect(getCrawlsDir('/data')).toBe(path.join('/data', 'crawls'));
      expect(getCrawlDir('/data', 'south')).toBe(path.join('/data', 'crawls', 'south'));
    });

    it('should place checkpoint and lock inside the crawl directory', () => {
      expect(getCheckpointPath('/data', 'south')).toBe(
        path.join('/data', 'crawls', 'south', 'checkpoint.json')
      );
      expect(getLockPath('/data', 'south')).toBe(
        path.join('/data', 'crawls', 'south', 'crawl.lock')
      );
    });

    it('should reject crawl names with path traversal', () => {
      expect(() => getCrawlDir('/data', '../etc')).toThrow('path traversal not allowed');
      expect(() => getCrawlDir('/data', 'a/b')).toThrow('path traversal not allowed');
      expect(() => getCrawlDir('/data', 'a\\b')).toThrow('path traversal not allowed');
    });
  });

  describe('validateIdSecurity', () => {
    it('should reject empty ids', () => {
      expect(() => validateIdSecurity('  ', 'crawlName')).toThrow('crawlName must not be empty');
    });

    it('should accept plain names', () => {
      expect(() => validateIdSecurity('jakarta-south_2024', 'crawlName')).not.toThrow();
    });
  });
});
