/**
 * src/functions/calcParking.ts
 *
 * Required parking stalls for a use, from the use's rule document. Rules are
 * tried in order and the first one that applies produces the raw demand,
 * which is then rounded with the tenths rule and optionally discounted for
 * transit proximity. Anything that cannot be computed comes back with a null
 * count and the reasons why.
 */

import { isResidentialUse, isSingleFamilyUse } from '../lib/use-types';
import { ceilTolerant, floorTolerant } from '../utils/numeric';
import type {
  ParkingBaseMetric,
  ParkingInputs,
  ParkingResult,
  ParkingRule,
  ParkingRuleRecord,
  RuleLookup,
} from '../types';

export const SMALL_NON_RESIDENTIAL_WAIVER_M2 = 100;
export const TRANSIT_DISCOUNT_FACTOR = 0.8;
export const SINGLE_FAMILY_EXEMPTION_TEXT = 'Single-family residential: no minimum parking requirement.';

/**
 * Rounds raw demand by its tenths digit: 5 or more rounds up to the next
 * integer, anything lower rounds down. 2.49 -> 2, 2.50 -> 3, 2.51 -> 3.
 */
export function roundParkingDemand(raw: number | null | undefined): number | null {
  if (raw === null || raw === undefined || !Number.isFinite(raw)) return null;
  if (raw <= 0) return 0;

  const tenthsTotal = floorTolerant(raw * 10);
  const whole = Math.floor(tenthsTotal / 10);
  return tenthsTotal % 10 >= 5 ? whole + 1 : whole;
}

// -------------------------
// Conditions
// -------------------------

type Operator = '<' | '<=' | '>' | '>=' | '==' | '!=';

interface Comparison {
  variable: string;
  operator: Operator;
  value: number;
}

const COMPARISON = /^\s*([a-z_][a-z0-9_]*)\s*(<=|>=|==|!=|<|>)\s*(-?\d+(?:\.\d+)?)\s*$/i;

/**
 * Parses `"unit_area_m2 >= 90"` style conditions, optionally joined with
 * `and`. Returns null for anything else; nothing is ever evaluated as code.
 */
export function parseCondition(condition: string): Comparison[] | null {
  const parts = condition.split(/\s+and\s+|\s*&&\s*/i);
  const comparisons: Comparison[] = [];
  for (const part of parts) {
    const match = COMPARISON.exec(part);
    if (!match) return null;
    const [, variable, operator, value] = match;
    if (!isOperator(operator)) return null;
    comparisons.push({ variable, operator, value: Number(value) });
  }
  return comparisons;
}

const isOperator = (value: string): value is Operator =>
  ['<', '<=', '>', '>=', '==', '!='].includes(value);

function compare(left: number, { operator, value }: Comparison): boolean {
  switch (operator) {
    case '<':
      return left < value;
    case '<=':
      return left <= value;
    case '>':
      return left > value;
    case '>=':
      return left >= value;
    case '==':
      return left === value;
    case '!=':
      return left !== value;
  }
}

const conditionContext = (inputs: ParkingInputs): Record<string, number | undefined> => ({
  ...inputs.metrics,
  usable_area_m2: inputs.usableAreaM2,
  units: inputs.units ?? inputs.metrics?.units,
  unit_area_m2: inputs.unitAreaM2,
});

// -------------------------
// Rule evaluation
// -------------------------

const metricValue = (inputs: ParkingInputs, metric: ParkingBaseMetric): number | undefined => {
  switch (metric) {
    case 'usable_area_m2':
      return inputs.usableAreaM2;
    case 'units':
      return inputs.units ?? inputs.metrics?.units;
    default:
      return inputs.metrics?.[metric];
  }
};

interface Evaluation {
  raw: number;
  text: string | null;
}

const withinBand = (area: number, minM2: number, maxM2: number | null): boolean =>
  area >= minM2 && (maxM2 === null || area <= maxM2);

/**
 * Raw demand for a single rule, or null when the rule does not apply.
 * Reasons for skipping a rule are pushed onto `notes`.
 */
function evaluateRule(
  rule: ParkingRule,
  baseMetric: ParkingBaseMetric,
  inputs: ParkingInputs,
  notes: string[]
): Evaluation | null {
  const area = inputs.usableAreaM2;
  const text = rule.text ?? null;
  const areaBased = baseMetric === 'usable_area_m2';

  switch (rule.type) {
    case 'fixed':
      return { raw: rule.value, text };

    case 'ratio': {
      if (areaBased) {
        if (rule.perM2 === undefined) {
          notes.push('Ratio rule has no area divisor for an area-based use.');
          return null;
        }
        return { raw: area / rule.perM2, text };
      }
      const quantity = metricValue(inputs, baseMetric);
      if (rule.perUnits === undefined || quantity === undefined) {
        notes.push(`Missing "${baseMetric}" to apply the ratio rule.`);
        return null;
      }
      return { raw: quantity / rule.perUnits, text };
    }

    case 'band_ratio': {
      if (!areaBased) return null;
      const band = rule.bands.find(b => withinBand(area, b.minM2, b.maxM2));
      return band ? { raw: area / band.perM2, text: band.text ?? text } : null;
    }

    case 'threshold_fixed':
      if (!areaBased) return null;
      if (rule.maxM2 === null) {
        notes.push('Threshold rule has no area limit and cannot be applied automatically.');
        return null;
      }
      return area <= rule.maxM2 ? { raw: rule.count, text } : null;

    case 'ratio_above_threshold':
      if (!areaBased) return null;
      return area >= rule.minM2 ? { raw: area / rule.perM2, text } : null;

    case 'per_unit':
    case 'per_unit_with_condition': {
      const units = inputs.units ?? inputs.metrics?.units;
      if (units === undefined) {
        notes.push('Number of units is required for per-unit rules.');
        return null;
      }
      if (rule.type === 'per_unit_with_condition') {
        const comparisons = parseCondition(rule.condition);
        if (!comparisons) {
          notes.push(`Unsupported rule condition: "${rule.condition}".`);
          return null;
        }
        const context = conditionContext(inputs);
        const holds = comparisons.every(c => {
          const left = context[c.variable];
          return left !== undefined && compare(left, c);
        });
        if (!holds) return null;
      }
      return { raw: units * rule.value, text };
    }
  }
}

const emptyResult = (status: ParkingResult['status'], useCode: string | null): ParkingResult => ({
  status,
  useCode,
  raw: null,
  required: null,
  appliedRuleText: null,
  adjustments: [],
  cargoLoadingText: null,
  generalNotes: [],
  reasons: [],
});

/**
 * Required stalls for a use. `lookup` is the rules-database answer for the
 * use; "not found" and "invalid" are reported as results, never thrown.
 */
export function calcParking(lookup: RuleLookup<ParkingRuleRecord>, inputs: ParkingInputs): ParkingResult {
  // Houses owe no stalls whether or not the use has a rule document
  const useCode = inputs.useTypeCode ?? (lookup.status === 'found' ? lookup.record.useCode : '');
  if (isSingleFamilyUse(useCode, inputs.useLabel)) {
    return {
      ...emptyResult('waived', useCode),
      raw: 0,
      required: 0,
      appliedRuleText: SINGLE_FAMILY_EXEMPTION_TEXT,
    };
  }

  if (lookup.status === 'not_found') {
    return { ...emptyResult('no_rule', null), reasons: ['No parking rule registered for this use.'] };
  }
  if (lookup.status === 'invalid') {
    return {
      ...emptyResult('insufficient_data', null),
      reasons: ['Parking rule record is malformed.', ...lookup.errors],
    };
  }

  const rule = lookup.record;
  const out: ParkingResult = {
    ...emptyResult('insufficient_data', rule.useCode),
    cargoLoadingText: rule.cargoLoadingText,
    generalNotes: [...rule.generalNotes],
  };

  const area = inputs.usableAreaM2;
  if (!Number.isFinite(area) || area < 0) {
    out.reasons.push('Usable area must be a non-negative number.');
    return out;
  }

  if (
    inputs.isLocalStreet &&
    rule.baseMetric === 'usable_area_m2' &&
    area > 0 &&
    area <= SMALL_NON_RESIDENTIAL_WAIVER_M2 &&
    !isResidentialUse(rule.useCode)
  ) {
    return {
      ...out,
      status: 'waived',
      raw: 0,
      required: 0,
      appliedRuleText: `Waived: non-residential use up to ${SMALL_NON_RESIDENTIAL_WAIVER_M2} m² on a local street.`,
    };
  }

  let evaluation: Evaluation | null = null;
  for (const candidate of rule.rules) {
    evaluation = evaluateRule(candidate, rule.baseMetric, inputs, out.reasons);
    if (evaluation) break;
  }

  if (!evaluation) {
    out.reasons.push('Not enough data to compute the parking requirement automatically.');
    return out;
  }

  out.raw = evaluation.raw;
  out.appliedRuleText = evaluation.text;

  let required = roundParkingDemand(evaluation.raw);
  if (required === null) {
    out.reasons.push('Rule produced a non-numeric result.');
    return out;
  }

  if (inputs.nearTransit && required > 0) {
    const reduced = ceilTolerant(required * TRANSIT_DISCOUNT_FACTOR);
    out.adjustments.push({ type: 'transit_discount', from: required, to: reduced });
    required = reduced;
  }

  return { ...out, status: 'computed', required };
}
