/**
 * src/functions/computeEnvelope.ts
 *
 * Interior buildable rectangle of a lot once the setbacks are taken out, and
 * the comparison against the occupancy-ratio limit that decides which of the
 * two actually caps the ground floor.
 *
 * Lots are modelled as rectangles (frontage × depth). An over-constrained
 * lot clamps to zero width/depth rather than going negative.
 */

import type {
  BindingConstraint,
  EnvelopeInput,
  EnvelopeRegime,
  FootprintLimit,
  LotEnvelope,
  LotInput,
} from '../types';

const clamp = (value: number): number => (value > 0 ? value : 0);

const envelope = (usableWidthM: number, usableDepthM: number, regime: EnvelopeRegime): LotEnvelope => {
  const width = clamp(usableWidthM);
  const depth = clamp(usableDepthM);
  return {
    usableWidthM: width,
    usableDepthM: depth,
    interiorAreaM2: width * depth,
    regime,
  };
};

export function computeEnvelope({
  frontageM,
  depthM,
  frontSetbackM,
  sideSetbackM,
  rearSetbackM,
  isCorner,
  cornerHasTwoFrontages,
  attachOneSide,
}: EnvelopeInput): LotEnvelope {
  const usableDepth = depthM - frontSetbackM - rearSetbackM;
  // Attaching to one boundary only ever removes an interior side setback
  const attachedSide = attachOneSide ? 0 : sideSetbackM;

  if (isCorner && cornerHasTwoFrontages) {
    // The secondary frontage keeps a front setback
    return envelope(frontageM - (attachedSide + frontSetbackM), usableDepth, 'corner_two_frontages');
  }

  return envelope(
    frontageM - (attachedSide + sideSetbackM),
    usableDepth,
    isCorner ? 'corner_single_frontage' : 'mid_block'
  );
}

/**
 * Build-to-the-line variant for single-family houses: no front or side
 * setbacks, rear setback kept.
 */
export function computeBuildToLineEnvelope(lot: LotInput, rearSetbackM: number): LotEnvelope {
  return computeEnvelope({
    ...lot,
    frontSetbackM: 0,
    sideSetbackM: 0,
    rearSetbackM,
    attachOneSide: false,
  });
}

/**
 * Largest ground-floor footprint allowed by the occupancy ratio and the
 * envelope together, and which of the two is binding. The ratio binds when
 * its limit does not exceed the envelope; with no ratio registered the
 * envelope binds.
 */
export function footprintLimit(
  lotAreaM2: number,
  occupancyMax: number | null,
  interiorAreaM2: number
): FootprintLimit {
  const occupancyLimitM2 = occupancyMax === null ? null : clamp(lotAreaM2 * occupancyMax);
  const binding: BindingConstraint =
    occupancyLimitM2 !== null && occupancyLimitM2 <= interiorAreaM2 ? 'occupancy_ratio' : 'setbacks';

  return {
    maxFootprintM2: binding === 'occupancy_ratio' && occupancyLimitM2 !== null ? occupancyLimitM2 : interiorAreaM2,
    occupancyLimitM2,
    interiorAreaM2,
    binding,
  };
}
