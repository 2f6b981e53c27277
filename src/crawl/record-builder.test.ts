import { describe, it, expect } from '@jest/globals';
import { getProfile } from '../classify/profiles.js';
import type { PlaceDetail } from '../places/types.js';
import { buildRecord, formatPriceLevel, type RecordContext } from './record-builder.js';

const market = getProfile('market');
const community = getProfile('community');

function createMockContext(overrides: Partial<RecordContext> = {}): RecordContext {
  return {
    category: 'Competitor',
    subCategory: 'Clinic_Only',
    zoneName: 'Z1',
    keyword: 'vet clinic',
    searchName: 'Klinik Hewan Sehat',
    types: ['veterinary_care', 'point_of_interest'],
    timestamp: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('formatPriceLevel', () => {
  it('repeats the marker once per level', () => {
    expect(formatPriceLevel(0)).toBe('');
    expect(formatPriceLevel(2)).toBe('$$');
    expect(formatPriceLevel(4)).toBe('$$$$');
  });

  it('is empty for unknown or out-of-range levels', () => {
    expect(formatPriceLevel(undefined)).toBe('');
    expect(formatPriceLevel(5)).toBe('');
    expect(formatPriceLevel(1.5)).toBe('');
  });
});

describe('buildRecord', () => {
  it('assembles a complete record', () => {
    const detail: PlaceDetail = {
      placeId: 'P1',
      name: 'Klinik Hewan Sehat',
      formattedAddress: 'Jl. Kemang Raya 1, Jakarta',
      vicinity: 'Kemang',
      location: { lat: -6.26, lng: 106.81 },
      rating: 4.5,
      userRatingsTotal: 100,
      website: 'https://vet.example.com',
      phone: '+62 21 000000',
      priceLevel: 2,
      businessStatus: 'OPERATIONAL',
      openNow: true,
    };

    expect(buildRecord(detail, createMockContext(), market)).toEqual({
      placeId: 'P1',
      name: 'Klinik Hewan Sehat',
      category: 'Competitor',
      subCategory: 'Clinic_Only',
      latitude: -6.26,
      longitude: 106.81,
      address: 'Jl. Kemang Raya 1, Jakarta',
      vicinity: 'Kemang',
      rating: 4.5,
      reviewCount: 100,
      website: 'https://vet.example.com',
      phone: '+62 21 000000',
      priceLevel: '$$',
      types: ['veterinary_care', 'point_of_interest'],
      isOperational: true,
      searchZone: 'Z1',
      searchKeyword: 'vet clinic',
      isOpenNow: true,
      timestamp: '2026-01-01T00:00:00.000Z',
      popularityScore: 0.09,
      bufferRadiusM: 2000,
    });
  });

  it('fills gaps in a sparse detail', () => {
    const record = buildRecord({ placeId: 'P2' }, createMockContext(), market);

    expect(record.name).toBe('Klinik Hewan Sehat');
    expect(record.address).toBe('');
    expect(record.rating).toBeUndefined();
    expect(record.reviewCount).toBe(0);
    expect(record.priceLevel).toBe('');
    expect(record.popularityScore).toBe(0);
  });

  it('drops out-of-range ratings and coordinates', () => {
    const record = buildRecord(
      { placeId: 'P3', rating: 7, location: { lat: 120, lng: 106.81 }, userRatingsTotal: -3 },
      createMockContext(),
      market
    );

    expect(record.rating).toBeUndefined();
    expect(record.latitude).toBeUndefined();
    expect(record.longitude).toBe(106.81);
    expect(record.reviewCount).toBe(0);
  });

  it('treats a missing business status as operational', () => {
    const record = buildRecord(
      { placeId: 'P1', name: 'Vet', rating: 4.5, userRatingsTotal: 100 },
      createMockContext(),
      market
    );
    expect(record.isOperational).toBe(true);
  });

  it('marks closed businesses as not operational', () => {
    const record = buildRecord(
      { placeId: 'P4', businessStatus: 'CLOSED_TEMPORARILY' },
      createMockContext(),
      market
    );
    expect(record.isOperational).toBe(false);
  });

  it('falls back to the query radius for the buffer', () => {
    const context = createMockContext({ category: 'Education', subCategory: 'School', radiusHint: 750 });

    expect(buildRecord({ placeId: 'P5' }, context, community).bufferRadiusM).toBe(750);
    expect(
      buildRecord({ placeId: 'P5' }, createMockContext({ category: 'Education' }), community).bufferRadiusM
    ).toBeUndefined();
  });

  it('copies the type tags', () => {
    const types = ['veterinary_care'];
    const record = buildRecord({ placeId: 'P6' }, createMockContext({ types }), market);
    types.push('store');

    expect(record.types).toEqual(['veterinary_care']);
  });
});
