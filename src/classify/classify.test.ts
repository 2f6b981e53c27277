/**
 * Classification Tests
 *
 * Covers relevance filtering, sub-category refinement, scoring and the
 * built-in profiles.
 */

import { describe, it, expect } from '@jest/globals';
import { isConfigurationError } from '../errors/index.js';
import { refine } from './classifier.js';
import { bufferRadiusFor, getProfile, isProfileName } from './profiles.js';
import { containsPhrase, isRelevant } from './relevance.js';
import { popularityScore } from './scorer.js';

const market = getProfile('market');
const community = getProfile('community');

// ============================================================================
// Relevance
// ============================================================================

describe('isRelevant', () => {
  it('accepts when no exclusion rule fires', () => {
    expect(isRelevant('Klinik Hewan Sehat', ['veterinary_care'], 'Competitor', market.relevance)).toBe(
      true
    );
  });

  it('rejects any place carrying an excluded type, whatever its name', () => {
    for (const type of market.relevance.irrelevantTypes) {
      expect(isRelevant('Vet Clinic', ['veterinary_care', type], 'Competitor', market.relevance)).toBe(
        false
      );
    }
  });

  it('matches types case-insensitively', () => {
    expect(isRelevant('Anything', ['PARKING'], 'Customer', market.relevance)).toBe(false);
  });

  it('rejects excluded name fragments', () => {
    expect(isRelevant('Kemang Parking Lot', ['point_of_interest'], 'Customer', market.relevance)).toBe(
      false
    );
    expect(isRelevant('BCA ATM Center', ['finance'], 'Customer', market.relevance)).toBe(false);
  });

  it('matches name fragments on word boundaries only', () => {
    expect(isRelevant('Pet Treatment Center', ['veterinary_care'], 'Competitor', market.relevance)).toBe(
      true
    );
  });

  it('keeps place_of_worship only for community infrastructure', () => {
    const types = ['place_of_worship', 'mosque'];
    expect(isRelevant('Masjid Al-Ikhlas', types, 'Community_Infrastructure', community.relevance)).toBe(
      true
    );
    expect(isRelevant('Masjid Al-Ikhlas', types, 'Family_Services', community.relevance)).toBe(false);
    expect(isRelevant('Masjid Al-Ikhlas', types, 'Customer', market.relevance)).toBe(false);
  });

  it('applies category hints after exclusions', () => {
    const rules = community.relevance;
    expect(isRelevant('Pasar Mayestik', ['shopping_mall'], 'Community_Infrastructure', rules)).toBe(false);
    expect(isRelevant('Pasar Mayestik', ['market'], 'Community_Infrastructure', rules)).toBe(true);
    expect(isRelevant('Gudang Sembako', ['store'], 'Value_Conscious_Retail', rules)).toBe(false);
  });

  it('defaults to accept when no hint matches', () => {
    expect(isRelevant('Toko Serba Ada', ['store'], 'Value_Conscious_Retail', community.relevance)).toBe(
      true
    );
  });
});

describe('containsPhrase', () => {
  it('requires word boundaries on both sides', () => {
    expect(containsPhrase('SD Negeri 01', 'sd')).toBe(true);
    expect(containsPhrase('Tsdk Store', 'sd')).toBe(false);
    expect(containsPhrase('Warung-Padang', 'padang')).toBe(true);
    expect(containsPhrase('Circle K Kemang', 'circle k')).toBe(true);
  });

  it('finds a later bounded occurrence after an embedded one', () => {
    expect(containsPhrase('Treatment and ATM', 'atm')).toBe(true);
  });

  it('never matches an empty phrase', () => {
    expect(containsPhrase('anything', '')).toBe(false);
  });
});

// ============================================================================
// Classifier
// ============================================================================

describe('refine', () => {
  const rules = market.classification;
  const vet = ['veterinary_care'];

  it('splits general clinics by name', () => {
    expect(refine('Happy Paws Grooming', vet, 'Competitor', 'Clinic_General', rules)).toBe(
      'Clinic+Grooming'
    );
    expect(refine('Pet Salon & Clinic', vet, 'Competitor', 'Clinic_General', rules)).toBe(
      'Clinic+Grooming'
    );
    expect(refine('Klinik Hewan 24 Jam', vet, 'Competitor', 'Clinic_General', rules)).toBe(
      'Emergency_Hospital'
    );
    expect(refine('Klinik Hewan Sehat', vet, 'Competitor', 'Clinic_General', rules)).toBe(
      'Clinic_Only'
    );
  });

  it('downgrades emergency hospitals without 24-hour service', () => {
    expect(refine('Jakarta Animal Hospital', vet, 'Competitor', 'Emergency_Hospital', rules)).toBe(
      'Clinic_Only'
    );
    expect(refine('RSH 24h Kemang', vet, 'Competitor', 'Emergency_Hospital', rules)).toBe(
      'Emergency_Hospital'
    );
  });

  it('recognises pet stores among customers', () => {
    expect(refine('Pet Kingdom', ['pet_store'], 'Customer', 'Pet_Owner_Hub', rules)).toBe('Pet_Store');
    expect(refine('Kingdom Mart', ['pet_store'], 'Customer', 'Pet_Owner_Hub', rules)).toBe(
      'Pet_Owner_Hub'
    );
  });

  it('maps other veterinary competitors to Clinic_Only', () => {
    expect(refine('Paws Hotel', vet, 'Competitor', 'Pet_Hotel', rules)).toBe('Clinic_Only');
    expect(refine('Paws Hotel', ['pet_store', 'veterinary_care'], 'Competitor', 'Pet_Hotel', rules)).toBe(
      'Pet_Hotel'
    );
  });

  it('is the identity when no rule matches', () => {
    expect(refine('Cafe Kopi', ['cafe'], 'Complementary', 'Cafe', rules)).toBe('Cafe');
    expect(refine('Anything', [], 'Community_Infrastructure', 'Masjid', community.classification)).toBe(
      'Masjid'
    );
  });
});

// ============================================================================
// Scorer
// ============================================================================

describe('popularityScore', () => {
  it('multiplies normalised rating by capped reviews', () => {
    expect(popularityScore(4.5, 100)).toBe(0.09);
    expect(popularityScore(5, 1000)).toBe(1);
    expect(popularityScore(5, 25000)).toBe(1);
    expect(popularityScore(3, 500)).toBe(0.25);
    expect(popularityScore(1, 1000)).toBe(0);
  });

  it('returns 0 when either input is missing or not a number', () => {
    expect(popularityScore(undefined, 100)).toBe(0);
    expect(popularityScore(4.5, undefined)).toBe(0);
    expect(popularityScore(null, 100)).toBe(0);
    expect(popularityScore(4.5, Number.NaN)).toBe(0);
  });

  it('stays within [0, 1] across the rating and review range', () => {
    for (let rating = 1; rating <= 5; rating += 0.25) {
      for (const reviews of [0, 1, 10, 250, 999, 1000, 1001, 50000]) {
        const score = popularityScore(rating, reviews);
        expect(score).toBeGreaterThanOrEqual(0);
        expect(score).toBeLessThanOrEqual(1);
      }
    }
  });
});

// ============================================================================
// Profiles
// ============================================================================

describe('profiles', () => {
  it('uses the competitor buffer table for the market profile', () => {
    expect(bufferRadiusFor(market, 'Competitor', 'Clinic+Grooming')).toBe(3000);
    expect(bufferRadiusFor(market, 'Competitor', 'Clinic_Only')).toBe(2000);
    expect(bufferRadiusFor(market, 'Competitor', 'Pet_Hotel')).toBe(1500);
    expect(bufferRadiusFor(market, 'Customer', 'Pet_Store')).toBeUndefined();
  });

  it('falls back to the radius hint when the table has no entry', () => {
    expect(bufferRadiusFor(community, 'Family_Services', 'Posyandu', 1000)).toBe(1000);
    expect(bufferRadiusFor(market, 'Competitor', 'Clinic_Only', 500)).toBe(2000);
  });

  it('searches in Indonesian for the community profile', () => {
    expect(community.language).toBe('id');
    expect(market.language).toBeUndefined();
  });

  it('rejects unknown profile names', () => {
    expect(isProfileName('market')).toBe(true);
    expect(() => getProfile('nightlife')).toThrow('Unknown profile: nightlife');
    try {
      getProfile('nightlife');
    } catch (error) {
      expect(isConfigurationError(error)).toBe(true);
    }
  });
});
