/**
 * Tests for cost configuration
 *
 * @module config/costs.test
 */

import { describe, it, expect } from '@jest/globals';
import {
  API_COSTS,
  calculateApiCost,
  calculateCrawlCost,
  estimateCrawl,
  formatCost,
} from './costs.js';

describe('costs', () => {
  describe('API_COSTS', () => {
    it('has Places pricing', () => {
      expect(API_COSTS.places.nearbySearch).toBe(0.032);
      expect(API_COSTS.places.placeDetails).toBe(0.017);
    });
  });

  describe('calculateApiCost', () => {
    it('multiplies per-call price by count', () => {
      expect(calculateApiCost('nearbySearch', 1000)).toBeCloseTo(32, 6);
      expect(calculateApiCost('placeDetails', 0)).toBe(0);
    });
  });

  describe('calculateCrawlCost', () => {
    it('sums both call types', () => {
      const cost = calculateCrawlCost(100, 200);
      expect(cost.nearbySearch).toBeCloseTo(3.2, 6);
      expect(cost.placeDetails).toBeCloseTo(3.4, 6);
      expect(cost.total).toBeCloseTo(6.6, 6);
    });
  });

  describe('estimateCrawl', () => {
    it('plans searches, details and coverage', () => {
      const estimate = estimateCrawl([1000, 2000], 10, 30);
      expect(estimate.searches).toBe(20);
      expect(estimate.detailCalls).toBe(600);
      expect(estimate.totalCalls).toBe(620);
      expect(estimate.areaKm2).toBeCloseTo(Math.PI * 5, 6);
      expect(estimate.cost.total).toBeCloseTo(20 * 0.032 + 600 * 0.017, 6);
    });

    it('returns zeros for an empty catalog', () => {
      const estimate = estimateCrawl([], 5);
      expect(estimate.searches).toBe(0);
      expect(estimate.areaKm2).toBe(0);
      expect(estimate.cost.total).toBe(0);
    });
  });

  describe('formatCost', () => {
    it('formats with two decimals', () => {
      expect(formatCost(1.234)).toBe('$1.23');
      expect(formatCost(0)).toBe('$0.00');
    });
  });
});
