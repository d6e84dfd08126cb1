/**
 * src/functions/calcSanitary.ts
 *
 * Minimum sanitary fixtures for a usable floor area. Each profile group picks
 * the band covering the area; a fixture is either a fixed count or a
 * "1/300,00m² ou fração" style formula, i.e. one fixture per 300 m² or part
 * thereof. Counts are summed across groups.
 */

import { ceilTolerant } from '../utils/numeric';
import { FIXTURE_TYPES } from '../types';
import type {
  FixtureType,
  RuleLookup,
  SanitaryBand,
  SanitaryGroupResult,
  SanitaryProfile,
  SanitaryResult,
} from '../types';

const FORMULA_DIVISOR = /1\s*\/\s*([\d.,]+)\s*m/;

/**
 * Divisor of a per-area formula, reading numbers in Brazilian notation:
 * "1/1.200,00m²" -> 1200. Null when the text carries no usable divisor.
 */
export function parseFormulaDivisor(formula: string): number | null {
  const match = FORMULA_DIVISOR.exec(formula);
  if (!match) return null;
  const divisor = Number(match[1].replace(/\./g, '').replace(',', '.'));
  return Number.isFinite(divisor) && divisor > 0 ? divisor : null;
}

const findBand = (bands: SanitaryBand[], area: number): SanitaryBand | undefined =>
  bands.find(b => area >= b.minM2 && (b.maxM2 === null || area <= b.maxM2));

function fixtureCount(value: number | string | undefined, area: number): number | null {
  if (value === undefined) return null;
  if (typeof value === 'number') return Math.trunc(value);
  const divisor = parseFormulaDivisor(value);
  return divisor === null ? null : ceilTolerant(area / divisor);
}

/**
 * Fixture counts for `usableAreaM2` under the use's sanitary profile.
 */
export function calcSanitary(lookup: RuleLookup<SanitaryProfile>, usableAreaM2: number): SanitaryResult {
  const out: SanitaryResult = {
    status: 'insufficient_data',
    profileCode: null,
    usableAreaM2,
    groups: [],
    totals: {},
    reasons: [],
  };

  if (lookup.status === 'not_found') {
    return { ...out, status: 'no_rule', reasons: ['No sanitary profile registered for this use.'] };
  }
  if (lookup.status === 'invalid') {
    return { ...out, reasons: ['Sanitary profile record is malformed.', ...lookup.errors] };
  }

  const profile = lookup.record;
  out.profileCode = profile.profileCode;

  if (!Number.isFinite(usableAreaM2) || usableAreaM2 < 0) {
    out.reasons.push('Usable area must be a non-negative number.');
    return out;
  }

  const totals: Partial<Record<FixtureType, number>> = {};

  for (const group of profile.groups) {
    const band = findBand(group.bands, usableAreaM2);
    if (!band) continue;

    const fixtures: SanitaryGroupResult['fixtures'] = {};
    for (const type of FIXTURE_TYPES) {
      const value = band.fixtures[type];
      if (value === undefined) continue;

      const count = fixtureCount(value, usableAreaM2);
      fixtures[type] = count;
      if (count === null) {
        out.reasons.push(`Could not read the ${type} formula "${String(value)}" in group ${group.group}.`);
      } else {
        totals[type] = (totals[type] ?? 0) + count;
      }
    }

    out.groups.push(band.note ? { group: group.group, fixtures, note: band.note } : { group: group.group, fixtures });
  }

  if (out.groups.length === 0) {
    out.reasons.push(`No band of profile ${profile.profileCode} covers ${usableAreaM2} m².`);
    return out;
  }

  return { ...out, status: 'computed', totals };
}
