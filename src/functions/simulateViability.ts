/**
 * src/functions/simulateViability.ts
 *
 * Plain-language viability check on top of the urbanism limits.
 *
 * - Auto mode (no desired area): reports the largest total area the zone
 *   allows, min(IA total, ground-floor max × floors).
 * - Project mode: checks the desired total against IA and the implied
 *   footprint (total / floors) against the ground-floor max.
 */

import type { UrbanismComputed } from './computeUrbanism';

const TOLERANCE = 1e-9;

export interface ViabilityRequest {
  desiredTotalAreaM2?: number;
  desiredFloors?: number;
  usableAreaM2?: number;
}

export interface ViabilitySimulation {
  mode: 'auto_limits' | 'project';
  floorsUsed: number;
  totalAreaM2: number;
  footprintM2: number;
  usableAreaM2: number;
  usableAreaSource: 'provided' | 'total_area';
  groundFloorShareOfLot: number | null;
  projectShareOfLot: number | null;
  checks: {
    hasOccupancy: boolean;
    hasFloorArea: boolean;
    hasPermeability: boolean;
    occupancyOk: boolean | null;
    floorAreaOk: boolean | null;
  };
  viable: boolean;
  reasons: string[];
}

const positive = (value: number | null | undefined): value is number =>
  typeof value === 'number' && Number.isFinite(value) && value > 0;

export function simulateViability(
  urbanism: UrbanismComputed,
  { desiredTotalAreaM2 = 0, desiredFloors = 0, usableAreaM2 = 0 }: ViabilityRequest = {}
): ViabilitySimulation {
  const { lotAreaM2, maxGroundFloorM2, totalFloorAreaMaxM2, permeableMinM2 } = urbanism;

  const floorsUsed = Math.max(
    positive(desiredFloors) ? Math.trunc(desiredFloors) : urbanism.estimatedFloors ?? 1,
    1
  );
  const autoMode = !positive(desiredTotalAreaM2);

  let totalAreaM2: number;
  if (autoMode) {
    const candidates: number[] = [];
    if (positive(totalFloorAreaMaxM2)) candidates.push(totalFloorAreaMaxM2);
    if (positive(maxGroundFloorM2)) candidates.push(maxGroundFloorM2 * floorsUsed);
    totalAreaM2 = candidates.length > 0 ? Math.min(...candidates) : 0;
  } else {
    totalAreaM2 = desiredTotalAreaM2;
  }

  const footprintM2 = totalAreaM2 / floorsUsed;

  const hasOccupancy = urbanism.record.occupancyMax !== null && maxGroundFloorM2 !== null;
  const hasFloorArea = totalFloorAreaMaxM2 !== null;
  const hasPermeability = permeableMinM2 !== null;

  const occupancyOk = hasOccupancy && maxGroundFloorM2 !== null ? footprintM2 <= maxGroundFloorM2 + TOLERANCE : null;
  const floorAreaOk =
    hasFloorArea && totalFloorAreaMaxM2 !== null ? totalAreaM2 <= totalFloorAreaMaxM2 + TOLERANCE : null;

  const reasons: string[] = [];
  let viable = true;

  if (!autoMode) {
    if (floorAreaOk === false) {
      viable = false;
      reasons.push('Total built area exceeds the maximum allowed by the floor-area ratio (IA).');
    }
    if (occupancyOk === false) {
      viable = false;
      reasons.push('Ground-floor footprint exceeds the maximum allowed by the occupancy ratio and setbacks.');
    }
  }
  if (!hasFloorArea) reasons.push('Maximum floor-area ratio (IA) is not registered; the total limit may be incomplete.');
  if (!hasOccupancy) reasons.push('Occupancy ratio or setbacks are not registered; the ground-floor limit may be incomplete.');
  if (!hasPermeability) reasons.push('Minimum permeability ratio (TP) is not registered; the permeable area is unknown.');

  const usableProvided = positive(usableAreaM2);

  return {
    mode: autoMode ? 'auto_limits' : 'project',
    floorsUsed,
    totalAreaM2,
    footprintM2,
    usableAreaM2: usableProvided ? usableAreaM2 : totalAreaM2,
    usableAreaSource: usableProvided ? 'provided' : 'total_area',
    groundFloorShareOfLot: lotAreaM2 > 0 && maxGroundFloorM2 !== null ? maxGroundFloorM2 / lotAreaM2 : null,
    projectShareOfLot: lotAreaM2 > 0 ? footprintM2 / lotAreaM2 : null,
    checks: { hasOccupancy, hasFloorArea, hasPermeability, occupancyOk, floorAreaOk },
    viable,
    reasons,
  };
}
