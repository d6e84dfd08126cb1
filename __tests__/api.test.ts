import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../src/app';
import { config } from '../src/config';
import { SpatialIndexCache, buildIndexes } from '../src/lib/dataset-cache';
import { SqliteRulesRepository, type RulesSeed } from '../src/lib/rules-repository';
import type { SourceFeature } from '../src/types';

const zones: SourceFeature[] = [
  {
    geometry: {
      type: 'Polygon',
      coordinates: [
        [
          [-0.01, -0.01],
          [0.01, -0.01],
          [0.01, 0.01],
          [-0.01, 0.01],
          [-0.01, -0.01],
        ],
      ],
    },
    properties: { sigla: 'ZR-1', nome: 'Residential 1' },
  },
];

const streets: SourceFeature[] = [
  {
    geometry: { type: 'LineString', coordinates: [[0.001, -0.01], [0.001, 0.01]] },
    properties: { LOG_OFIC: 'Rua das Flores', HIERARQUIA: 'Local' },
  },
];

const zoneRule = {
  zoneCode: 'ZR-1',
  occupancyMax: 0.5,
  permeabilityMin: 0.25,
  floorAreaMax: 1,
  frontSetbackM: 5,
  sideSetbackM: 1.5,
  rearSetbackM: 3,
  heightLimitFloors: 2,
};

const seed: RulesSeed = {
  useTypes: [
    { code: 'RES_UNI', label: 'House', category: 'Residential' },
    { code: 'COM_RETAIL', label: 'Retail', category: 'Commercial' },
  ],
  zoneRules: [
    { ...zoneRule, useTypeCode: 'RES_UNI' },
    { ...zoneRule, useTypeCode: 'COM_RETAIL' },
  ],
  parkingRules: [{ useCode: 'COM_RETAIL', baseMetric: 'usable_area_m2', rules: [{ type: 'ratio', perM2: 50 }] }],
  sanitaryProfiles: [
    {
      profileCode: 'COMMERCIAL',
      groups: [{ group: 'PUBLIC', bands: [{ minM2: 0, maxM2: 100, fixtures: { toilets: 1 } }] }],
    },
  ],
  useSanitaryProfiles: [{ useTypeCode: 'COM_RETAIL', profileCode: 'COMMERCIAL' }],
};

const lot = { frontageM: 10, depthM: 30 };

describe('API', () => {
  let indexes: SpatialIndexCache;
  let rules: SqliteRulesRepository;
  let app: Express;

  beforeAll(() => {
    indexes = new SpatialIndexCache(2);
    indexes.use('test', () => buildIndexes(zones, streets));
    rules = SqliteRulesRepository.inMemory(seed);
    app = createApp({
      indexes,
      rules,
      options: {
        maxBatchSize: 2,
        localOnly: false,
        security: { ...config, security: { ...config.security, enableMiddleware: false } },
      },
    });
  });

  afterAll(() => {
    indexes.close();
    rules.close();
  });

  describe('GET /health', () => {
    test('should report the loaded datasets', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('ok');
      expect(response.body.datasets).toEqual({ loaded: true, zones: 1, streets: 1 });
    });
  });

  describe('GET /location', () => {
    test('should resolve the zone and nearest street', async () => {
      const response = await request(app).get('/location').query({ lat: 0, lon: 0 });

      expect(response.status).toBe(200);
      expect(response.headers['cache-control']).toBeUndefined();
      expect(response.body).toMatchObject({
        zoneCode: 'ZR-1',
        zoneName: 'Residential 1',
        streetName: 'Rua das Flores',
        streetClass: 'Local',
      });
      expect(response.body.streetDistanceM).toBeCloseTo(111.32, 1);
    });

    test('should honour a smaller search radius', async () => {
      const response = await request(app).get('/location').query({ lat: 0, lon: 0, maxDistance: 50 });

      expect(response.body.zoneCode).toBe('ZR-1');
      expect(response.body.streetName).toBe('');
      expect(response.body.streetDistanceM).toBeNull();
    });

    test('should return empty fields outside every zone', async () => {
      const response = await request(app).get('/location').query({ lat: 1, lon: 1 });

      expect(response.status).toBe(200);
      expect(response.body.zoneCode).toBe('');
      expect(response.body.rawZoneProps).toEqual({});
    });

    test('should reject a non-numeric latitude', async () => {
      const response = await request(app).get('/location').query({ lat: 'abc', lon: 0 });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        status: 'error',
        statusCode: 400,
        message: 'Invalid request',
        details: ['"lat" must be a number'],
      });
    });
  });

  describe('POST /location/batch', () => {
    test('should resolve every coordinate in order', async () => {
      const response = await request(app)
        .post('/location/batch')
        .send({ coordinates: [{ lat: 0, lon: 0 }, { lat: 1, lon: 1 }] });

      expect(response.status).toBe(200);
      expect(response.body.results.map((result: { zoneCode: string }) => result.zoneCode)).toEqual(['ZR-1', '']);
    });

    test('should enforce the batch size limit', async () => {
      const coordinates = [{ lat: 0, lon: 0 }, { lat: 0, lon: 0 }, { lat: 0, lon: 0 }];
      const response = await request(app).post('/location/batch').send({ coordinates });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Maximum 2 coordinates per batch');
    });

    test('should reject malformed JSON', async () => {
      const response = await request(app)
        .post('/location/batch')
        .set('Content-Type', 'application/json')
        .send('{"coordinates": [');

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Malformed JSON body');
    });
  });

  describe('POST /envelope', () => {
    test('should compute the interior envelope and ground-floor limit', async () => {
      const response = await request(app)
        .post('/envelope')
        .send({ lot, setbacks: { frontSetbackM: 5, sideSetbackM: 1.5, rearSetbackM: 3 }, occupancyMax: 0.5 });

      expect(response.status).toBe(200);
      expect(response.body.lotAreaM2).toBe(300);
      expect(response.body.envelope).toEqual({
        usableWidthM: 7,
        usableDepthM: 22,
        interiorAreaM2: 154,
        regime: 'mid_block',
      });
      expect(response.body.limit).toEqual({
        maxFootprintM2: 150,
        occupancyLimitM2: 150,
        interiorAreaM2: 154,
        binding: 'occupancy_ratio',
      });
    });

    test('should require the setbacks', async () => {
      const response = await request(app).post('/envelope').send({ lot });

      expect(response.status).toBe(400);
      expect(response.body.details).toEqual(['"setbacks" is required']);
    });
  });

  describe('POST /viability', () => {
    test('should report the zone limits for a zone code', async () => {
      const response = await request(app).post('/viability').send({ zoneCode: 'ZR-1', useTypeCode: 'RES_UNI', lot });

      expect(response.status).toBe(200);
      expect(response.body.location).toBeNull();
      expect(response.body.urbanism.status).toBe('computed');
      expect(response.body.urbanism.maxGroundFloorM2).toBe(150);
      expect(response.body.simulation).toMatchObject({
        mode: 'auto_limits',
        floorsUsed: 2,
        totalAreaM2: 300,
        usableAreaM2: 300,
        viable: true,
      });
      expect(response.body.parking).toMatchObject({
        status: 'waived',
        useCode: 'RES_UNI',
        required: 0,
        appliedRuleText: 'Single-family residential: no minimum parking requirement.',
      });
      expect(response.body.sanitary.status).toBe('no_rule');
    });

    test('should locate the lot and waive parking for a small shop on a local street', async () => {
      const response = await request(app)
        .post('/viability')
        .send({ lat: 0, lon: 0, useTypeCode: 'COM_RETAIL', lot, project: { desiredTotalAreaM2: 80, desiredFloors: 1 } });

      expect(response.status).toBe(200);
      expect(response.body.zoneCode).toBe('ZR-1');
      expect(response.body.location.streetClass).toBe('Local');
      expect(response.body.simulation).toMatchObject({ mode: 'project', footprintM2: 80, viable: true });
      expect(response.body.parking).toMatchObject({ status: 'waived', required: 0 });
      expect(response.body.sanitary).toMatchObject({ status: 'computed', totals: { toilets: 1 } });
    });

    test('should require parking off a local street when told so', async () => {
      const response = await request(app)
        .post('/viability')
        .send({
          lat: 0,
          lon: 0,
          useTypeCode: 'COM_RETAIL',
          lot,
          project: { desiredTotalAreaM2: 80, desiredFloors: 1 },
          parking: { isLocalStreet: false },
        });

      expect(response.body.parking).toMatchObject({ status: 'computed', required: 2 });
    });

    test('should explain a zone without a record', async () => {
      const response = await request(app).post('/viability').send({ zoneCode: 'ZX', useTypeCode: 'RES_UNI', lot });

      expect(response.status).toBe(200);
      expect(response.body.urbanism).toMatchObject({
        status: 'no_rule',
        reasons: ['No regulatory record for zone ZX and use RES_UNI.'],
      });
      expect(response.body.simulation).toBeNull();
    });

    test('should require either a zone code or coordinates', async () => {
      const response = await request(app).post('/viability').send({ useTypeCode: 'RES_UNI', lot });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Invalid request');
    });
  });

  describe('GET /use-types', () => {
    test('should list the active use types', async () => {
      const response = await request(app).get('/use-types');

      expect(response.status).toBe(200);
      expect(response.body.useTypes).toEqual([
        { code: 'COM_RETAIL', label: 'Retail', category: 'Commercial' },
        { code: 'RES_UNI', label: 'House', category: 'Residential' },
      ]);
    });
  });

  describe('unknown routes', () => {
    test('should return 404', async () => {
      const response = await request(app).get('/unknown');

      expect(response.status).toBe(404);
      expect(response.body.message).toBe('Route not found: GET /unknown');
    });
  });
});

describe('API before the datasets are loaded', () => {
  const indexes = new SpatialIndexCache(1);
  const rules = SqliteRulesRepository.inMemory(seed);
  const app = createApp({ indexes, rules, options: { localOnly: false } });

  afterAll(() => {
    rules.close();
  });

  test('should report a degraded health status', async () => {
    const response = await request(app).get('/health');

    expect(response.body.status).toBe('degraded');
    expect(response.body.datasets).toEqual({ loaded: false, zones: 0, streets: 0 });
  });

  test('should fail location lookups with a 500', async () => {
    const response = await request(app).get('/location').query({ lat: 0, lon: 0 });

    expect(response.status).toBe(500);
    expect(response.body.message).toBe('Something went wrong');
  });
});
