import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigurationError, isConfigurationError } from '../errors/index.js';
import { catalogFingerprint, loadCatalog, loadQueries, loadZones } from './loader.js';

describe('catalog/loader', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'catalog-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeCsv(name: string, content: string): Promise<string> {
    const filePath = path.join(tempDir, name);
    await fs.writeFile(filePath, content);
    return filePath;
  }

  async function captureConfigError(promise: Promise<unknown>): Promise<ConfigurationError> {
    try {
      await promise;
    } catch (error) {
      if (isConfigurationError(error)) {
        return error;
      }
      throw error;
    }
    throw new Error('Expected a ConfigurationError');
  }

  describe('loadZones', () => {
    it('parses zones in file order', async () => {
      const file = await writeCsv(
        'zones.csv',
        'zone_name,latitude,longitude,radius\nKemang,-6.26,106.81,5000\nMenteng, -6.19 ,106.83,3000\n'
      );

      expect(await loadZones(file)).toEqual([
        { name: 'Kemang', center: { lat: -6.26, lng: 106.81 }, radiusM: 5000 },
        { name: 'Menteng', center: { lat: -6.19, lng: 106.83 }, radiusM: 3000 },
      ]);
    });

    it('reports missing columns before reading rows', async () => {
      const file = await writeCsv('zones.csv', 'zone_name,lat,lon,radius\nKemang,x,y,z\n');

      const error = await captureConfigError(loadZones(file));

      expect(error.message).toBe(`Missing required columns in ${file}: latitude, longitude`);
    });

    it('collects every invalid row', async () => {
      const file = await writeCsv(
        'zones.csv',
        'zone_name,latitude,longitude,radius\nNorth,95,106.8,5000\nSouth,-6.3,106.8,0\nEast,,106.9,1000\n'
      );

      const error = await captureConfigError(loadZones(file));

      expect(error.message).toBe(`Invalid zones in ${file}`);
      expect(error.details).toEqual([
        'row 2: center.lat: Number must be less than or equal to 90',
        'row 3: radiusM: Number must be greater than or equal to 1',
        'row 4: center.lat: Expected number, received nan',
      ]);
    });

    it('rejects radii above the provider maximum', async () => {
      const file = await writeCsv('zones.csv', 'zone_name,latitude,longitude,radius\nWide,0,0,50001\n');

      const error = await captureConfigError(loadZones(file));

      expect(error.details).toEqual(['row 2: radiusM: Number must be less than or equal to 50000']);
    });

    it('rejects duplicate zone names', async () => {
      const file = await writeCsv(
        'zones.csv',
        'zone_name,latitude,longitude,radius\nKemang,-6.26,106.81,5000\nKemang,-6.27,106.82,4000\n'
      );

      const error = await captureConfigError(loadZones(file));

      expect(error.details).toEqual(['row 3: duplicate zone name "Kemang" (first on row 2)']);
    });

    it('rejects an empty table', async () => {
      const file = await writeCsv('zones.csv', 'zone_name,latitude,longitude,radius\n');

      const error = await captureConfigError(loadZones(file));

      expect(error.message).toBe(`No zones in ${file}`);
    });

    it('reports a missing file as a configuration error', async () => {
      const file = path.join(tempDir, 'absent.csv');

      const error = await captureConfigError(loadZones(file));

      expect(error.message).toBe(`File not found: ${file}`);
    });
  });

  describe('loadQueries', () => {
    it('trims keywords and skips blank ones', async () => {
      const file = await writeCsv(
        'queries.csv',
        'keyword,category,sub_category\n  vet clinic ,Competitor,Clinic_General\n,Competitor,Clinic_General\n   ,Customer,Pet_Store\n'
      );

      expect(await loadQueries(file)).toEqual([
        { keyword: 'vet clinic', category: 'Competitor', subCategory: 'Clinic_General' },
      ]);
    });

    it('reads the optional radius column', async () => {
      const file = await writeCsv(
        'queries.csv',
        'keyword,category,sub_category,radius\nposyandu,Family_Services,Posyandu,1000\nmasjid,Community_Infrastructure,Masjid,\n'
      );

      expect(await loadQueries(file)).toEqual([
        { keyword: 'posyandu', category: 'Family_Services', subCategory: 'Posyandu', radiusM: 1000 },
        { keyword: 'masjid', category: 'Community_Infrastructure', subCategory: 'Masjid' },
      ]);
    });

    it('requires category and sub_category on every kept row', async () => {
      const file = await writeCsv(
        'queries.csv',
        'keyword,category,sub_category\nvet clinic,,Clinic_General\n'
      );

      const error = await captureConfigError(loadQueries(file));

      expect(error.details).toEqual(['row 2: category: String must contain at least 1 character(s)']);
    });

    it('reports missing columns', async () => {
      const file = await writeCsv('queries.csv', 'keyword,category\nvet,Competitor\n');

      const error = await captureConfigError(loadQueries(file));

      expect(error.message).toBe(`Missing required columns in ${file}: sub_category`);
    });
  });

  describe('catalogFingerprint', () => {
    const zones = [{ name: 'Z1', center: { lat: -6.26, lng: 106.81 }, radiusM: 5000 }];
    const queries = [{ keyword: 'vet clinic', category: 'Competitor', subCategory: 'Clinic_General' }];

    it('is a stable SHA-256 hex digest', () => {
      const fingerprint = catalogFingerprint(zones, queries);

      expect(fingerprint).toMatch(/^[0-9a-f]{64}$/);
      expect(catalogFingerprint(zones, queries)).toBe(fingerprint);
    });

    it('changes when the catalog changes', () => {
      const moved = [{ ...zones[0], radiusM: 4000 }];

      expect(catalogFingerprint(moved, queries)).not.toBe(catalogFingerprint(zones, queries));
    });
  });

  it('loadCatalog combines both tables with their fingerprint', async () => {
    const zonesFile = await writeCsv('zones.csv', 'zone_name,latitude,longitude,radius\nZ1,-6.26,106.81,5000\n');
    const queriesFile = await writeCsv(
      'queries.csv',
      'keyword,category,sub_category\nvet clinic,Competitor,Clinic_General\n'
    );

    const catalog = await loadCatalog(zonesFile, queriesFile);

    expect(catalog.zones).toHaveLength(1);
    expect(catalog.queries).toHaveLength(1);
    expect(catalog.fingerprint).toBe(catalogFingerprint(catalog.zones, catalog.queries));
  });
});
