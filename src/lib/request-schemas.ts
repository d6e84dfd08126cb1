/**
 * Joi schemas for the HTTP request payloads, plus the helper that turns a
 * failed validation into a 400.
 */

import * as Joi from 'joi';
import { ValidationError } from '../utils/errors';
import type { LotInput, ParkingBaseMetric, SetbackInput } from '../types';
import type { ViabilityRequest } from '../functions/simulateViability';

export interface LocationQuery {
  lat: number;
  lon: number;
  maxDistance?: number;
}

export interface BatchLocationBody {
  coordinates: { lat: number; lon: number }[];
  maxDistance?: number;
}

export interface EnvelopeBody {
  lot: LotInput;
  setbacks: SetbackInput;
  occupancyMax?: number;
}

export interface ParkingOptions {
  units?: number;
  unitAreaM2?: number;
  isLocalStreet?: boolean;
  nearTransit?: boolean;
  metrics?: Partial<Record<ParkingBaseMetric, number>>;
}

export interface ViabilityBody {
  zoneCode?: string;
  lat?: number;
  lon?: number;
  useTypeCode: string;
  useLabel?: string;
  lot: LotInput;
  project: ViabilityRequest;
  parking: ParkingOptions;
}

const latitude = Joi.number().min(-90).max(90);
const longitude = Joi.number().min(-180).max(180);
const maxDistance = Joi.number().min(0);
const meters = Joi.number().min(0);

const lotSchema = Joi.object<LotInput>({
  frontageM: Joi.number().greater(0).required(),
  depthM: Joi.number().greater(0).required(),
  isCorner: Joi.boolean().default(false),
  cornerHasTwoFrontages: Joi.boolean().default(false),
  attachOneSide: Joi.boolean().default(false),
});

export const locationQuerySchema = Joi.object<LocationQuery>({
  lat: latitude.required(),
  lon: longitude.required(),
  maxDistance,
});

export const batchLocationSchema = Joi.object<BatchLocationBody>({
  coordinates: Joi.array()
    .items(Joi.object({ lat: latitude.required(), lon: longitude.required() }))
    .min(1)
    .required(),
  maxDistance,
});

export const envelopeSchema = Joi.object<EnvelopeBody>({
  lot: lotSchema.required(),
  setbacks: Joi.object<SetbackInput>({
    frontSetbackM: meters.required(),
    sideSetbackM: meters.required(),
    rearSetbackM: meters.required(),
  }).required(),
  occupancyMax: Joi.number().min(0),
});

export const viabilitySchema = Joi.object<ViabilityBody>({
  zoneCode: Joi.string(),
  lat: latitude,
  lon: longitude,
  useTypeCode: Joi.string().required(),
  useLabel: Joi.string().allow(''),
  lot: lotSchema.required(),
  project: Joi.object<ViabilityRequest>({
    desiredTotalAreaM2: meters,
    desiredFloors: Joi.number().integer().min(0),
    usableAreaM2: meters,
  }).default({}),
  parking: Joi.object<ParkingOptions>({
    units: Joi.number().integer().min(0),
    unitAreaM2: meters,
    isLocalStreet: Joi.boolean(),
    nearTransit: Joi.boolean(),
    metrics: Joi.object({
      usable_area_m2: meters,
      units: meters,
      beds: meters,
      seats: meters,
      classrooms: meters,
    }),
  }).default({}),
})
  .or('zoneCode', 'lat')
  .and('lat', 'lon');

/**
 * Validates (and converts) a request payload, throwing a ValidationError that
 * lists every failing field.
 */
export function validateRequest<T>(schema: Joi.ObjectSchema<T>, payload: unknown): T {
  const { error, value } = schema.validate(payload, { abortEarly: false, convert: true });
  if (error) {
    throw new ValidationError('Invalid request', error.details.map(detail => detail.message));
  }
  if (value === undefined) {
    throw new ValidationError('Invalid request', ['request payload is required']);
  }
  return value;
}
