import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createServer } from '../../server.js';
import { compileFilterBands } from '../../services/compiler.js';
import type { FilterBandModel } from '../../services/filterbands/filter-band-model.js';
import { FIXTURE_HEADER, FIXTURE_SOURCE } from '../../__fixtures__/firmware.js';

describe('Filter API Routes', () => {
  const { model: compiled } = compileFilterBands(FIXTURE_HEADER, FIXTURE_SOURCE);
  let current: FilterBandModel | null;
  let app: FastifyInstance;

  beforeEach(async () => {
    current = compiled;
    app = await createServer(() => current, { logger: false });
  });

  afterEach(async () => {
    await app.close();
  });

  describe('GET /api/health', () => {
    it('should report the loaded table', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: 'ok', entries: 7, widebandId: 1 });
    });

    it('should return 503 before the table is compiled', async () => {
      current = null;
      const response = await app.inject({ method: 'GET', url: '/api/health' });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toEqual({ error: 'Filter table has not been compiled' });
    });
  });

  describe('GET /api/filters', () => {
    it('should list every filter', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/filters' });
      const body = response.json();

      expect(body.count).toBe(7);
      expect(body.filters.map((f: { hardwareId: number }) => f.hardwareId)).toEqual([0, 1, 2, 3, 4, 5, 6]);
    });

    it('should return a single filter with MHz edges', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/filters/4' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        hardwareId: 4,
        uplink: { lowDmhz: 17100, highDmhz: 17850, lowMhz: 1710, highMhz: 1785 },
        downlink: { lowDmhz: 18050, highDmhz: 18800, lowMhz: 1805, highMhz: 1880 },
        directionMask: 3,
        legacyFilterId: 7,
        band: 'BAND_FILTER_DCS1800',
        protocolBandNumber: 3,
        filterSlot: 1,
        filtersInGroup: 1,
        extraFlags: 1,
        calibrationGroup: 'COVERT872CALDATALOOKUP_NO_LOOKUP',
      });
    });

    it('should return 404 for an unknown id', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/filters/99' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: 'Filter not found' });
    });

    it('should return 400 for a malformed id', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/filters/abc' });
      expect(response.statusCode).toBe(400);
    });
  });

  describe('GET /api/bands', () => {
    it('should count filters per band', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/bands' });

      expect(response.json()).toEqual({
        bands: [
          { band: 'BAND_FILTER_EMPTY', count: 1 },
          { band: 'BAND_FILTER_WIDE', count: 1 },
          { band: 'BAND_FILTER_GSM850', count: 2 },
          { band: 'BAND_FILTER_DCS1800', count: 1 },
          { band: 'BAND_FILTER_LTE7', count: 2 },
        ],
      });
    });

    it('should list the filters of one band', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/bands/BAND_FILTER_LTE7/filters' });
      const body = response.json();

      expect(body.band).toBe('BAND_FILTER_LTE7');
      expect(body.filters.map((f: { hardwareId: number }) => f.hardwareId)).toEqual([5, 6]);
    });

    it('should return an empty list for a declared band without filters', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/bands/BAND_FILTER_MAX_NO/filters' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ band: 'BAND_FILTER_MAX_NO', filters: [] });
    });

    it('should return 404 for an unknown band', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/bands/BAND_FILTER_NOPE/filters' });
      expect(response.statusCode).toBe(404);
    });
  });

  describe('GET /api/select', () => {
    it('should select a filter and describe its switch setting', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/select?freqKhz=836000&bandwidthKhz=200&direction=uplink',
      });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.found).toBe(true);
      expect(body.hardwareId).toBe(2);
      expect(body.selection).toEqual({ hardwareId: 2, switchDirection: 'uplink', extraFlags: 0 });
      expect(body.filter.band).toBe('BAND_FILTER_GSM850');
    });

    it('should default to an unspecified direction and zero bandwidth', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/select?freqKhz=881000' });
      expect(response.json().hardwareId).toBe(3);
    });

    it('should report swapped filters', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/select?freqKhz=2530000&bandwidthKhz=10000&direction=uplink',
      });

      expect(response.json().selection).toEqual({ hardwareId: 5, switchDirection: 'downlink', extraFlags: 2 });
    });

    it('should restrict the search to a band', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/select?freqKhz=2520000&bandwidthKhz=5000&direction=uplink&band=BAND_FILTER_LTE7',
      });
      expect(response.json().hardwareId).toBe(6);
    });

    it('should fall back to the wideband filter', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/select?freqKhz=881000&bandwidthKhz=200&direction=uplink',
      });
      const body = response.json();

      expect(body.hardwareId).toBe(1);
      expect(body.selection).toEqual({ hardwareId: 1, switchDirection: 'uplink', extraFlags: 0 });
    });

    it('should report a miss', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/select?freqKhz=881000&bandwidthKhz=200&direction=uplink&ids=2,3',
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ found: false, hardwareId: null, selection: null, filter: null });
    });

    it('should return nothing above 6 GHz', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/select?freqKhz=6000000' });
      expect(response.json().found).toBe(false);
    });

    it('should reject bad query input with 400', async () => {
      const urls = [
        '/api/select',
        '/api/select?freqKhz=abc',
        '/api/select?freqKhz=-5',
        '/api/select?freqKhz=836000&bandwidthKhz=1.5',
        '/api/select?freqKhz=836000&direction=sideways',
        '/api/select?freqKhz=836000&ids=1,x',
        '/api/select?freqKhz=836000&band=BAND_FILTER_NOPE',
      ];

      for (const url of urls) {
        const response = await app.inject({ method: 'GET', url });
        expect(response.statusCode, url).toBe(400);
        expect(response.json().error).toEqual(expect.any(String));
      }
    });
  });
});
