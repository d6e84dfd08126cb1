/**
 * Express application: location lookups against the spatial indexes and the
 * rule calculators on top of the rules repository.
 *
 * The app is built from its collaborators so the server and the tests can
 * each supply their own.
 */

import express, { NextFunction, Request, Response } from 'express';
import compression from 'compression';
import { config } from './config';
import { logger } from './utils/logger';
import { securityMiddleware, type SecuritySettings } from './middleware/security';
import { localOnlyMiddleware } from './middleware/localOnlyMiddleware';
import { errorHandler } from './middleware/errorHandler';
import { NotFoundError, ValidationError } from './utils/errors';
import {
  batchLocationSchema,
  envelopeSchema,
  locationQuerySchema,
  validateRequest,
  viabilitySchema,
} from './lib/request-schemas';
import { resolveLocation } from './functions/resolveLocation';
import { computeBuildToLineEnvelope, computeEnvelope, footprintLimit } from './functions/computeEnvelope';
import { computeUrbanism } from './functions/computeUrbanism';
import { simulateViability } from './functions/simulateViability';
import { calcParking } from './functions/calcParking';
import { calcSanitary } from './functions/calcSanitary';
import type { SpatialIndexCache } from './lib/dataset-cache';
import type { RulesRepository } from './lib/rules-repository';
import type { LocationResult } from './types';

export interface AppOptions {
  maxBatchSize: number;
  streetMaxDistanceM: number;
  localOnly: boolean;
  security: SecuritySettings;
}

export interface AppDependencies {
  indexes: SpatialIndexCache;
  rules: RulesRepository;
  options?: Partial<AppOptions>;
}

const defaultOptions = (): AppOptions => ({
  maxBatchSize: config.api.maxBatchSize,
  streetMaxDistanceM: config.spatial.streetMaxDistanceM,
  localOnly: config.security.localOnly,
  security: config,
});

const LOCAL_STREET = /local/i;

const megabytes = (bytes: number): number => Math.round(bytes / 1024 / 1024);

export function createApp({ indexes, rules, options = {} }: AppDependencies): express.Express {
  const settings: AppOptions = { ...defaultOptions(), ...options };
  const app = express();

  app.use(
    compression({
      threshold: 1024, // Only compress responses larger than 1KB
      level: 6,
    })
  );
  app.use(securityMiddleware(settings.security));
  app.use(express.json({ limit: '1mb' }));

  // Health check (before local-only middleware for monitoring)
  app.get('/health', (_req: Request, res: Response) => {
    const memUsage = process.memoryUsage();
    const loaded = indexes.isLoaded;
    const current = loaded ? indexes.get() : null;

    res.json({
      status: loaded ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
      datasets: {
        loaded,
        zones: current ? current.zones.size : 0,
        streets: current ? current.streets.size : 0,
      },
      memory: {
        heapUsed: megabytes(memUsage.heapUsed),
        heapTotal: megabytes(memUsage.heapTotal),
        rss: megabytes(memUsage.rss),
      },
    });
  });

  app.use(localOnlyMiddleware(settings.localOnly));

  const locate = (lat: number, lon: number, maxDistanceM = settings.streetMaxDistanceM): LocationResult => {
    const result = resolveLocation(indexes.get(), { lat, lon, maxDistanceM });
    logger.debug('Resolved location', { lat, lon, zoneCode: result.zoneCode, streetName: result.streetName });
    return result;
  };

  app.get('/location', (req: Request, res: Response): void => {
    const { lat, lon, maxDistance } = validateRequest(locationQuerySchema, req.query);

    res.json(locate(lat, lon, maxDistance));
  });

  app.post('/location/batch', (req: Request, res: Response): void => {
    const { coordinates, maxDistance } = validateRequest(batchLocationSchema, req.body);

    if (coordinates.length > settings.maxBatchSize) {
      throw new ValidationError(`Maximum ${settings.maxBatchSize} coordinates per batch`);
    }

    res.json({ results: coordinates.map(({ lat, lon }) => locate(lat, lon, maxDistance)) });
  });

  app.post('/envelope', (req: Request, res: Response): void => {
    const { lot, setbacks, occupancyMax } = validateRequest(envelopeSchema, req.body);

    const envelope = computeEnvelope({ ...lot, ...setbacks });
    const buildToLine = computeBuildToLineEnvelope(lot, setbacks.rearSetbackM);
    const lotAreaM2 = lot.frontageM * lot.depthM;

    res.json({
      lotAreaM2,
      envelope,
      buildToLine,
      limit: footprintLimit(lotAreaM2, occupancyMax ?? null, envelope.interiorAreaM2),
    });
  });

  app.post('/viability', (req: Request, res: Response): void => {
    const body = validateRequest(viabilitySchema, req.body);

    const location = body.lat !== undefined && body.lon !== undefined ? locate(body.lat, body.lon) : null;
    const zoneCode = body.zoneCode ?? location?.zoneCode ?? '';
    const useTypeCode = body.useTypeCode;
    const useLabel = body.useLabel ?? rules.listUseTypes().find(useType => useType.code === useTypeCode)?.label ?? '';

    const urbanism = computeUrbanism(rules.getZoneRule(zoneCode, useTypeCode), {
      zoneCode,
      useTypeCode,
      useLabel,
      lot: body.lot,
    });
    const simulation = urbanism.status === 'computed' ? simulateViability(urbanism, body.project) : null;
    const usableAreaM2 = simulation
      ? simulation.usableAreaM2
      : body.project.usableAreaM2 ?? body.project.desiredTotalAreaM2 ?? 0;

    const isLocalStreet = body.parking.isLocalStreet ?? (location ? LOCAL_STREET.test(location.streetClass) : false);

    res.json({
      location,
      zoneCode,
      useTypeCode,
      urbanism,
      simulation,
      parking: calcParking(rules.getParkingRule(useTypeCode), {
        ...body.parking,
        useTypeCode,
        useLabel,
        usableAreaM2,
        isLocalStreet,
      }),
      sanitary: calcSanitary(rules.getSanitaryProfileForUse(useTypeCode), usableAreaM2),
    });
  });

  app.get('/use-types', (_req: Request, res: Response): void => {
    res.json({ useTypes: rules.listUseTypes() });
  });

  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(new NotFoundError(`Route not found: ${req.method} ${req.path}`));
  });

  app.use(errorHandler);

  return app;
}
