/**
 * src/functions/computeUrbanism.ts
 *
 * Lot-level limits for a zone/use pair: ratio areas (TO, TP, IA), the setback
 * envelope, the resulting ground-floor maximum and an estimated floor count.
 * Single-family uses also get the build-to-line implantation option next to
 * the standard setbacks.
 */

import { computeBuildToLineEnvelope, computeEnvelope, footprintLimit } from './computeEnvelope';
import { isSingleFamilyUse } from '../lib/use-types';
import { floorTolerant } from '../utils/numeric';
import type { BindingConstraint, FootprintLimit, LotEnvelope, LotInput, RegulatoryRecord, RuleLookup } from '../types';

export const FLOOR_HEIGHT_M = 3.0;

export interface ImplantationOption {
  key: 'standard' | 'build_to_line';
  name: string;
  frontSetbackM: number;
  sideSetbackM: number;
  rearSetbackM: number;
  envelope: LotEnvelope;
  limit: FootprintLimit;
}

export interface LotCheck {
  rule: 'min_lot_area' | 'max_lot_area' | 'min_frontage' | 'max_frontage';
  limit: number;
  actual: number;
  ok: boolean;
}

export interface UrbanismComputed {
  status: 'computed';
  zoneCode: string;
  useTypeCode: string;
  lotAreaM2: number;
  record: RegulatoryRecord;
  occupancyAreaM2: number | null;
  permeableMinM2: number | null;
  totalFloorAreaMinM2: number | null;
  totalFloorAreaMaxM2: number | null;
  basementMaxM2: number | null;
  attachOneSide: boolean;
  envelope: LotEnvelope | null;
  maxGroundFloorM2: number | null;
  binding: BindingConstraint | null;
  estimatedFloors: number | null;
  lotChecks: LotCheck[];
  options: ImplantationOption[];
  reasons: string[];
}

export interface UrbanismUnavailable {
  status: 'no_rule' | 'insufficient_data';
  zoneCode: string;
  useTypeCode: string;
  lotAreaM2: number;
  reasons: string[];
}

export type UrbanismResult = UrbanismComputed | UrbanismUnavailable;

/**
 * Floors allowed by the height limit: the registered floor count when there
 * is one, otherwise one floor per 3 m of height (at least one).
 */
export function estimateFloors(heightLimitFloors: number | null, heightLimitM: number | null): number | null {
  if (heightLimitFloors !== null && heightLimitFloors > 0) return Math.trunc(heightLimitFloors);
  if (heightLimitM === null || !Number.isFinite(heightLimitM)) return null;
  return Math.max(floorTolerant(heightLimitM / FLOOR_HEIGHT_M), 1);
}

const areaOf = (ratio: number | null, lotAreaM2: number): number | null =>
  ratio === null ? null : ratio * lotAreaM2;

function lotChecks(record: RegulatoryRecord, lot: LotInput, lotAreaM2: number): LotCheck[] {
  const checks: LotCheck[] = [];
  if (record.minLotAreaM2 !== null) {
    checks.push({ rule: 'min_lot_area', limit: record.minLotAreaM2, actual: lotAreaM2, ok: lotAreaM2 >= record.minLotAreaM2 });
  }
  if (record.maxLotAreaM2 !== null) {
    checks.push({ rule: 'max_lot_area', limit: record.maxLotAreaM2, actual: lotAreaM2, ok: lotAreaM2 <= record.maxLotAreaM2 });
  }
  const minFrontage = lot.isCorner ? record.minFrontageCornerM : record.minFrontageMidBlockM;
  if (minFrontage !== null) {
    checks.push({ rule: 'min_frontage', limit: minFrontage, actual: lot.frontageM, ok: lot.frontageM >= minFrontage });
  }
  if (record.maxFrontageM !== null) {
    checks.push({ rule: 'max_frontage', limit: record.maxFrontageM, actual: lot.frontageM, ok: lot.frontageM <= record.maxFrontageM });
  }
  return checks;
}

export function computeUrbanism(
  lookup: RuleLookup<RegulatoryRecord>,
  { zoneCode, useTypeCode, useLabel = '', lot }: { zoneCode: string; useTypeCode: string; useLabel?: string; lot: LotInput }
): UrbanismResult {
  const lotAreaM2 = lot.frontageM * lot.depthM;

  if (lookup.status === 'not_found') {
    return {
      status: 'no_rule',
      zoneCode,
      useTypeCode,
      lotAreaM2,
      reasons: [`No regulatory record for zone ${zoneCode || '(unknown)'} and use ${useTypeCode}.`],
    };
  }
  if (lookup.status === 'invalid') {
    return { status: 'insufficient_data', zoneCode, useTypeCode, lotAreaM2, reasons: lookup.errors };
  }

  const record = lookup.record;
  const reasons: string[] = [];

  const attachOneSide = lot.attachOneSide && record.allowAttachOneSide;
  if (lot.attachOneSide && !record.allowAttachOneSide) {
    reasons.push('Attaching to one side is not allowed for this zone and use; both side setbacks were applied.');
  }
  const effectiveLot: LotInput = { ...lot, attachOneSide };

  const occupancyAreaM2 = areaOf(record.occupancyMax, lotAreaM2);
  const { frontSetbackM, sideSetbackM, rearSetbackM } = record;

  let envelope: LotEnvelope | null = null;
  let limit: FootprintLimit | null = null;
  const options: ImplantationOption[] = [];

  if (frontSetbackM !== null && sideSetbackM !== null && rearSetbackM !== null) {
    envelope = computeEnvelope({ ...effectiveLot, frontSetbackM, sideSetbackM, rearSetbackM });
    limit = footprintLimit(lotAreaM2, record.occupancyMax, envelope.interiorAreaM2);

    if (isSingleFamilyUse(useTypeCode, useLabel) || record.allowBuildToLine) {
      const buildToLine = computeBuildToLineEnvelope(effectiveLot, rearSetbackM);
      options.push(
        {
          key: 'standard',
          name: 'Standard zone setbacks',
          frontSetbackM,
          sideSetbackM,
          rearSetbackM,
          envelope,
          limit,
        },
        {
          key: 'build_to_line',
          name: 'Build to the line (no front or side setbacks)',
          frontSetbackM: 0,
          sideSetbackM: 0,
          rearSetbackM,
          envelope: buildToLine,
          limit: footprintLimit(lotAreaM2, record.occupancyMax, buildToLine.interiorAreaM2),
        }
      );
    }
  } else {
    reasons.push('Setbacks are not fully registered; the ground-floor limit ignores the envelope.');
  }

  if (record.occupancyMax === null) reasons.push('Maximum occupancy ratio (TO) is not registered.');
  if (record.floorAreaMax === null) reasons.push('Maximum floor-area ratio (IA) is not registered.');
  if (record.permeabilityMin === null) reasons.push('Minimum permeability ratio (TP) is not registered.');

  return {
    status: 'computed',
    zoneCode,
    useTypeCode,
    lotAreaM2,
    record,
    occupancyAreaM2,
    permeableMinM2: areaOf(record.permeabilityMin, lotAreaM2),
    totalFloorAreaMinM2: areaOf(record.floorAreaMin, lotAreaM2),
    totalFloorAreaMaxM2: areaOf(record.floorAreaMax, lotAreaM2),
    basementMaxM2: areaOf(record.basementOccupancyMax, lotAreaM2),
    attachOneSide,
    envelope,
    maxGroundFloorM2: limit ? limit.maxFootprintM2 : occupancyAreaM2,
    binding: limit ? limit.binding : null,
    estimatedFloors: estimateFloors(record.heightLimitFloors, record.heightLimitM),
    lotChecks: lotChecks(record, lot, lotAreaM2),
    options,
    reasons,
  };
}
