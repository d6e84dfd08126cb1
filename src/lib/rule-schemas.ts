/**
 * Joi schemas for the JSON rule documents stored in the rules database.
 * A row that fails validation is reported back as "invalid" with the joi
 * messages, so the calculators can explain why nothing was computed.
 */

import * as Joi from 'joi';
import type { ParkingRuleRecord, RegulatoryRecord, RuleLookup, SanitaryProfile, UseType } from '../types';
import { FIXTURE_TYPES } from '../types';

const text = Joi.string().allow('');
const areaM2 = Joi.number().min(0);
const positive = Joi.number().greater(0);

const parkingBand = Joi.object({
  minM2: areaM2.default(0),
  maxM2: areaM2.allow(null).default(null),
  perM2: positive.required(),
  text,
});

const parkingRule = Joi.alternatives().try(
  Joi.object({ type: Joi.string().valid('fixed').required(), value: Joi.number().min(0).required(), text }),
  Joi.object({
    type: Joi.string().valid('ratio').required(),
    perM2: positive,
    perUnits: positive,
    text,
  }).or('perM2', 'perUnits'),
  Joi.object({
    type: Joi.string().valid('band_ratio').required(),
    bands: Joi.array().items(parkingBand).min(1).required(),
    text,
  }),
  Joi.object({
    type: Joi.string().valid('threshold_fixed').required(),
    maxM2: areaM2.allow(null).default(null),
    count: Joi.number().min(0).required(),
    text,
  }),
  Joi.object({
    type: Joi.string().valid('ratio_above_threshold').required(),
    minM2: areaM2.required(),
    perM2: positive.required(),
    text,
  }),
  Joi.object({ type: Joi.string().valid('per_unit').required(), value: Joi.number().min(0).required(), text }),
  Joi.object({
    type: Joi.string().valid('per_unit_with_condition').required(),
    value: Joi.number().min(0).required(),
    condition: Joi.string().required(),
    text,
  })
);

export const parkingRuleRecordSchema = Joi.object<ParkingRuleRecord>({
  useCode: Joi.string().required(),
  baseMetric: Joi.string().valid('usable_area_m2', 'units', 'beds', 'seats', 'classrooms').required(),
  rules: Joi.array().items(parkingRule).required(),
  cargoLoadingText: Joi.string().allow(null).default(null),
  generalNotes: Joi.array().items(Joi.string()).default([]),
});

const fixtureValue = Joi.alternatives().try(Joi.number().integer().min(0), Joi.string());

const sanitaryBand = Joi.object({
  minM2: areaM2.default(0),
  maxM2: areaM2.allow(null).default(null),
  fixtures: Joi.object(Object.fromEntries(FIXTURE_TYPES.map(type => [type, fixtureValue]))).default({}),
  note: Joi.string(),
});

export const sanitaryProfileSchema = Joi.object<SanitaryProfile>({
  profileCode: Joi.string().required(),
  title: Joi.string().allow('').default(''),
  groups: Joi.array()
    .items(
      Joi.object({
        group: Joi.string().default('GENERAL'),
        bands: Joi.array().items(sanitaryBand).required(),
      })
    )
    .required(),
});

/**
 * Validates a decoded JSON document against a schema, turning the outcome
 * into a rule lookup result.
 */
export function validateRule<T>(schema: Joi.ObjectSchema<T>, document: unknown): RuleLookup<T> {
  const { error, value } = schema.validate(document, { abortEarly: false, convert: true });
  if (error || value === undefined) {
    return { status: 'invalid', errors: error ? error.details.map(detail => detail.message) : ['empty document'] };
  }
  return { status: 'found', record: value };
}

const ratio = Joi.number().min(0).allow(null).default(null);
const meters = Joi.number().min(0).allow(null).default(null);

export const regulatoryRecordSchema = Joi.object<RegulatoryRecord>({
  zoneCode: Joi.string().required(),
  useTypeCode: Joi.string().required(),
  occupancyMax: ratio,
  permeabilityMin: ratio,
  floorAreaMin: ratio,
  floorAreaMax: ratio,
  basementOccupancyMax: ratio,
  frontSetbackM: meters,
  sideSetbackM: meters,
  rearSetbackM: meters,
  heightLimitM: meters,
  heightLimitFloors: Joi.number().integer().min(0).allow(null).default(null),
  minLotAreaM2: meters,
  maxLotAreaM2: meters,
  minFrontageMidBlockM: meters,
  minFrontageCornerM: meters,
  maxFrontageM: meters,
  allowAttachOneSide: Joi.boolean().default(false),
  allowBuildToLine: Joi.boolean().default(false),
  notes: Joi.string().allow(null, '').default(null),
  sourceRef: Joi.string().allow(null, '').default(null),
});

export const useTypeSchema = Joi.object<UseType>({
  code: Joi.string().required(),
  label: Joi.string().required(),
  category: Joi.string().default('System'),
});

export const useSanitaryLinkSchema = Joi.object<{ useTypeCode: string; profileCode: string }>({
  useTypeCode: Joi.string().required(),
  profileCode: Joi.string().required(),
});
