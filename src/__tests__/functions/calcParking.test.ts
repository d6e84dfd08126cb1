import { calcParking, parseCondition, roundParkingDemand } from '../../functions/calcParking';
import type { ParkingRule, ParkingRuleRecord, RuleLookup } from '../../types';

const found = (
  useCode: string,
  baseMetric: ParkingRuleRecord['baseMetric'],
  rules: ParkingRule[],
  extra: Partial<ParkingRuleRecord> = {}
): RuleLookup<ParkingRuleRecord> => ({
  status: 'found',
  record: { useCode, baseMetric, rules, cargoLoadingText: null, generalNotes: [], ...extra },
});

const retail = found(
  'COM_RETAIL',
  'usable_area_m2',
  [
    {
      type: 'band_ratio',
      bands: [
        { minM2: 0, maxM2: 400, perM2: 50, text: 'up to 400 m²' },
        { minM2: 400, maxM2: null, perM2: 25, text: 'above 400 m²' },
      ],
    },
  ],
  { cargoLoadingText: 'One loading bay above 2,000 m².', generalNotes: ['Covered stalls count.'] }
);

const multiFamily = found('RES_MULTI', 'units', [
  { type: 'per_unit_with_condition', value: 2, condition: 'unit_area_m2 >= 120', text: '2 per large unit' },
  { type: 'per_unit', value: 1, text: '1 per unit' },
]);

describe('roundParkingDemand', () => {
  test('should round by the tenths digit', () => {
    expect(roundParkingDemand(2.49)).toBe(2);
    expect(roundParkingDemand(2.5)).toBe(3);
    expect(roundParkingDemand(2.51)).toBe(3);
    expect(roundParkingDemand(2.96)).toBe(3);
    expect(roundParkingDemand(3)).toBe(3);
  });

  test('should floor non-positive demand at zero', () => {
    expect(roundParkingDemand(0)).toBe(0);
    expect(roundParkingDemand(-4)).toBe(0);
  });

  test('should return null for missing or non-finite demand', () => {
    expect(roundParkingDemand(null)).toBeNull();
    expect(roundParkingDemand(undefined)).toBeNull();
    expect(roundParkingDemand(Number.NaN)).toBeNull();
    expect(roundParkingDemand(Number.POSITIVE_INFINITY)).toBeNull();
  });
});

describe('parseCondition', () => {
  test('should parse a single comparison', () => {
    expect(parseCondition('unit_area_m2 >= 90')).toEqual([{ variable: 'unit_area_m2', operator: '>=', value: 90 }]);
  });

  test('should parse comparisons joined with and', () => {
    expect(parseCondition('units > 2 and unit_area_m2 < 70.5')).toEqual([
      { variable: 'units', operator: '>', value: 2 },
      { variable: 'unit_area_m2', operator: '<', value: 70.5 },
    ]);
    expect(parseCondition('units > 2 && units <= 10')).toHaveLength(2);
  });

  test('should refuse anything that is not a plain comparison', () => {
    expect(parseCondition('process.exit()')).toBeNull();
    expect(parseCondition('units > 2 or units < 1')).toBeNull();
    expect(parseCondition('')).toBeNull();
  });
});

describe('calcParking', () => {
  test('should report a missing rule distinctly from zero', () => {
    expect(calcParking({ status: 'not_found' }, { usableAreaM2: 200 })).toEqual({
      status: 'no_rule',
      useCode: null,
      raw: null,
      required: null,
      appliedRuleText: null,
      adjustments: [],
      cargoLoadingText: null,
      generalNotes: [],
      reasons: ['No parking rule registered for this use.'],
    });
  });

  test('should report a malformed rule as insufficient data', () => {
    const result = calcParking({ status: 'invalid', errors: ['"rules" is required'] }, { usableAreaM2: 200 });

    expect(result.status).toBe('insufficient_data');
    expect(result.required).toBeNull();
    expect(result.reasons).toEqual(['Parking rule record is malformed.', '"rules" is required']);
  });

  test('should reject a negative area', () => {
    const result = calcParking(retail, { usableAreaM2: -1 });

    expect(result.status).toBe('insufficient_data');
    expect(result.reasons).toEqual(['Usable area must be a non-negative number.']);
  });

  test('should use the band covering the area', () => {
    const result = calcParking(retail, { usableAreaM2: 150 });

    expect(result).toMatchObject({
      status: 'computed',
      useCode: 'COM_RETAIL',
      raw: 3,
      required: 3,
      appliedRuleText: 'up to 400 m²',
      cargoLoadingText: 'One loading bay above 2,000 m².',
      generalNotes: ['Covered stalls count.'],
    });
    expect(calcParking(retail, { usableAreaM2: 400 }).required).toBe(8);
    expect(calcParking(retail, { usableAreaM2: 500 }).required).toBe(20);
  });

  test('should waive small non-residential uses on local streets', () => {
    const result = calcParking(retail, { usableAreaM2: 80, isLocalStreet: true });

    expect(result.status).toBe('waived');
    expect(result.required).toBe(0);
    expect(result.appliedRuleText).toBe('Waived: non-residential use up to 100 m² on a local street.');
  });

  test('should not waive above the area limit or off local streets', () => {
    expect(calcParking(retail, { usableAreaM2: 120, isLocalStreet: true }).status).toBe('computed');
    expect(calcParking(retail, { usableAreaM2: 80 }).required).toBe(2);
  });

  test('should not waive residential uses', () => {
    const flats = found('RES_MULTI', 'usable_area_m2', [{ type: 'ratio', perM2: 50 }]);
    const result = calcParking(flats, { usableAreaM2: 80, isLocalStreet: true });

    expect(result.status).toBe('computed');
    expect(result.raw).toBeCloseTo(1.6, 10);
    expect(result.required).toBe(2);
  });

  test('should exempt single-family houses from any minimum', () => {
    const house = found('RES_UNI', 'units', [{ type: 'per_unit', value: 1 }]);

    expect(calcParking(house, { usableAreaM2: 200 })).toEqual({
      status: 'waived',
      useCode: 'RES_UNI',
      raw: 0,
      required: 0,
      appliedRuleText: 'Single-family residential: no minimum parking requirement.',
      adjustments: [],
      cargoLoadingText: null,
      generalNotes: [],
      reasons: [],
    });
  });

  test('should exempt a single-family use that has no rule document', () => {
    const result = calcParking({ status: 'not_found' }, { usableAreaM2: 200, useTypeCode: 'RES_UNI' });

    expect(result.status).toBe('waived');
    expect(result.required).toBe(0);
  });

  test('should recognise a single-family use by its label', () => {
    const result = calcParking({ status: 'not_found' }, { usableAreaM2: 200, useTypeCode: 'R1', useLabel: 'Single-family house' });

    expect(result.required).toBe(0);
  });

  test('should apply the transit discount and record it', () => {
    const result = calcParking(retail, { usableAreaM2: 500, nearTransit: true });

    expect(result.required).toBe(16);
    expect(result.adjustments).toEqual([{ type: 'transit_discount', from: 20, to: 16 }]);
  });

  test('should not discount a zero requirement', () => {
    const free = found('SERV_KIOSK', 'usable_area_m2', [{ type: 'fixed', value: 0 }]);
    const result = calcParking(free, { usableAreaM2: 30, nearTransit: true });

    expect(result.required).toBe(0);
    expect(result.adjustments).toEqual([]);
  });

  test('should apply a conditional per-unit rule when its condition holds', () => {
    const result = calcParking(multiFamily, { usableAreaM2: 1300, units: 10, unitAreaM2: 130 });

    expect(result.required).toBe(20);
    expect(result.appliedRuleText).toBe('2 per large unit');
  });

  test('should fall through to the next rule when the condition fails', () => {
    expect(calcParking(multiFamily, { usableAreaM2: 800, units: 10, unitAreaM2: 80 }).required).toBe(10);
    expect(calcParking(multiFamily, { usableAreaM2: 800, units: 10 }).required).toBe(10);
  });

  test('should explain why nothing applies without a unit count', () => {
    const result = calcParking(multiFamily, { usableAreaM2: 800 });

    expect(result.status).toBe('insufficient_data');
    expect(result.required).toBeNull();
    expect(result.reasons).toEqual([
      'Number of units is required for per-unit rules.',
      'Number of units is required for per-unit rules.',
      'Not enough data to compute the parking requirement automatically.',
    ]);
  });

  test('should skip an unsupported condition with a note', () => {
    const odd = found('RES_MULTI', 'units', [
      { type: 'per_unit_with_condition', value: 2, condition: 'luxury == yes' },
      { type: 'per_unit', value: 1 },
    ]);
    const result = calcParking(odd, { usableAreaM2: 500, units: 4 });

    expect(result.required).toBe(4);
    expect(result.reasons).toEqual(['Unsupported rule condition: "luxury == yes".']);
  });

  test('should apply a fixed count below the threshold and a ratio above it', () => {
    const office = found('SERV_OFFICE', 'usable_area_m2', [
      { type: 'threshold_fixed', maxM2: 60, count: 1 },
      { type: 'ratio', perM2: 50 },
    ]);

    expect(calcParking(office, { usableAreaM2: 50 }).required).toBe(1);
    expect(calcParking(office, { usableAreaM2: 100 }).required).toBe(2);
  });

  test('should skip an open threshold with a note', () => {
    const open = found('SERV_OFFICE', 'usable_area_m2', [{ type: 'threshold_fixed', maxM2: null, count: 1 }]);
    const result = calcParking(open, { usableAreaM2: 50 });

    expect(result.status).toBe('insufficient_data');
    expect(result.reasons[0]).toBe('Threshold rule has no area limit and cannot be applied automatically.');
  });

  test('should only apply a ratio above its threshold', () => {
    const warehouse = found('IND_STORAGE', 'usable_area_m2', [
      { type: 'ratio_above_threshold', minM2: 200, perM2: 40 },
    ]);

    expect(calcParking(warehouse, { usableAreaM2: 100 }).status).toBe('insufficient_data');
    expect(calcParking(warehouse, { usableAreaM2: 400 }).required).toBe(10);
  });

  test('should divide other metrics by their unit ratio', () => {
    const school = found('INST_SCHOOL', 'classrooms', [{ type: 'ratio', perUnits: 1 }]);

    expect(calcParking(school, { usableAreaM2: 900, metrics: { classrooms: 12 } }).required).toBe(12);

    const missing = calcParking(school, { usableAreaM2: 900 });
    expect(missing.required).toBeNull();
    expect(missing.reasons[0]).toBe('Missing "classrooms" to apply the ratio rule.');
  });
});
