import type { Position } from 'geojson';

// -------------------------
// Features
// -------------------------

export type PropertyValue = string | number | boolean | null;
export type FeatureProperties = Record<string, PropertyValue>;

/**
 * A feature as produced by the dataset loader: geometry still undecoded,
 * properties already reduced to scalars.
 */
export interface SourceFeature {
  geometry: unknown;
  properties: FeatureProperties;
}

/** [longitude, latitude] in degrees */
export type LonLat = Position;

/** [x, y] in Web Mercator meters */
export type ProjectedXY = Position;

export interface StreetMatch {
  properties: FeatureProperties;
  distanceM: number;
}

// Location lookup result
export interface LocationResult {
  zoneCode: string;
  zoneName: string;
  streetName: string;
  streetClass: string;
  streetDistanceM: number | null;
  rawZoneProps: FeatureProperties;
  rawStreetProps: FeatureProperties;
}

// -------------------------
// Lot envelope
// -------------------------

export type EnvelopeRegime = 'mid_block' | 'corner_two_frontages' | 'corner_single_frontage';

export interface LotInput {
  frontageM: number;
  depthM: number;
  isCorner: boolean;
  cornerHasTwoFrontages: boolean;
  attachOneSide: boolean;
}

export interface SetbackInput {
  frontSetbackM: number;
  sideSetbackM: number;
  rearSetbackM: number;
}

export type EnvelopeInput = LotInput & SetbackInput;

export interface LotEnvelope {
  usableWidthM: number;
  usableDepthM: number;
  interiorAreaM2: number;
  regime: EnvelopeRegime;
}

export type BindingConstraint = 'occupancy_ratio' | 'setbacks';

export interface FootprintLimit {
  maxFootprintM2: number;
  occupancyLimitM2: number | null;
  interiorAreaM2: number;
  binding: BindingConstraint;
}

// -------------------------
// Regulatory records (rules database)
// -------------------------

export interface UseType {
  code: string;
  label: string;
  category: string;
}

export interface RegulatoryRecord {
  zoneCode: string;
  useTypeCode: string;
  occupancyMax: number | null;
  permeabilityMin: number | null;
  floorAreaMin: number | null;
  floorAreaMax: number | null;
  basementOccupancyMax: number | null;
  frontSetbackM: number | null;
  sideSetbackM: number | null;
  rearSetbackM: number | null;
  heightLimitM: number | null;
  heightLimitFloors: number | null;
  minLotAreaM2: number | null;
  maxLotAreaM2: number | null;
  minFrontageMidBlockM: number | null;
  minFrontageCornerM: number | null;
  maxFrontageM: number | null;
  allowAttachOneSide: boolean;
  allowBuildToLine: boolean;
  notes: string | null;
  sourceRef: string | null;
}

export type ParkingBaseMetric = 'usable_area_m2' | 'units' | 'beds' | 'seats' | 'classrooms';

export interface AreaBand {
  minM2: number;
  maxM2: number | null;
}

export interface ParkingBand extends AreaBand {
  perM2: number;
  text?: string;
}

export type ParkingRule =
  | { type: 'fixed'; value: number; text?: string }
  | { type: 'ratio'; perM2?: number; perUnits?: number; text?: string }
  | { type: 'band_ratio'; bands: ParkingBand[]; text?: string }
  | { type: 'threshold_fixed'; maxM2: number | null; count: number; text?: string }
  | { type: 'ratio_above_threshold'; minM2: number; perM2: number; text?: string }
  | { type: 'per_unit'; value: number; text?: string }
  | { type: 'per_unit_with_condition'; value: number; condition: string; text?: string };

export interface ParkingRuleRecord {
  useCode: string;
  baseMetric: ParkingBaseMetric;
  rules: ParkingRule[];
  cargoLoadingText: string | null;
  generalNotes: string[];
}

export const FIXTURE_TYPES = ['lavatories', 'toilets', 'showers', 'urinals'] as const;
export type FixtureType = (typeof FIXTURE_TYPES)[number];

export interface SanitaryBand extends AreaBand {
  fixtures: Partial<Record<FixtureType, number | string>>;
  note?: string;
}

export interface SanitaryGroup {
  group: string;
  bands: SanitaryBand[];
}

export interface SanitaryProfile {
  profileCode: string;
  title: string;
  groups: SanitaryGroup[];
}

// Lookups that may fail on data rather than on code
export type RuleLookup<T> =
  | { status: 'found'; record: T }
  | { status: 'not_found' }
  | { status: 'invalid'; errors: string[] };

// -------------------------
// Rule computations
// -------------------------

export interface ParkingInputs {
  usableAreaM2: number;
  useTypeCode?: string;
  useLabel?: string;
  units?: number;
  unitAreaM2?: number;
  isLocalStreet?: boolean;
  nearTransit?: boolean;
  metrics?: Partial<Record<ParkingBaseMetric, number>>;
}

export interface ParkingAdjustment {
  type: 'transit_discount';
  from: number;
  to: number;
}

export interface ParkingResult {
  status: 'computed' | 'waived' | 'insufficient_data' | 'no_rule';
  useCode: string | null;
  raw: number | null;
  required: number | null;
  appliedRuleText: string | null;
  adjustments: ParkingAdjustment[];
  cargoLoadingText: string | null;
  generalNotes: string[];
  reasons: string[];
}

export interface SanitaryGroupResult {
  group: string;
  fixtures: Partial<Record<FixtureType, number | null>>;
  note?: string;
}

export interface SanitaryResult {
  status: 'computed' | 'insufficient_data' | 'no_rule';
  profileCode: string | null;
  usableAreaM2: number;
  groups: SanitaryGroupResult[];
  totals: Partial<Record<FixtureType, number>>;
  reasons: string[];
}
