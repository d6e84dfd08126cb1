/**
 * src/lib/rules-repository.ts
 *
 * Read access to the regulatory rules database: zone/use records, parking
 * rule documents and sanitary profiles. The production database is a file
 * opened read-only (built by setup-database.ts); tests use `:memory:`.
 *
 * Lookups return "not_found" or "invalid" results instead of throwing, so a
 * missing or broken row turns into an explanation for the user.
 */

import Database from 'better-sqlite3';
import type { ObjectSchema } from 'joi';
import {
  parkingRuleRecordSchema,
  regulatoryRecordSchema,
  sanitaryProfileSchema,
  useSanitaryLinkSchema,
  useTypeSchema,
  validateRule,
} from './rule-schemas';
import type { ParkingRuleRecord, RegulatoryRecord, RuleLookup, SanitaryProfile, UseType } from '../types';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('rules-repository');

export interface RulesRepository {
  getZoneRule(zoneCode: string, useTypeCode: string): RuleLookup<RegulatoryRecord>;
  getParkingRule(useCode: string): RuleLookup<ParkingRuleRecord>;
  getSanitaryProfileForUse(useCode: string): RuleLookup<SanitaryProfile>;
  listUseTypes(): UseType[];
}

/**
 * Raw seed documents, as read from `data/rules/*.json`. Every entry is
 * validated before it is written.
 */
export interface RulesSeed {
  useTypes: unknown[];
  zoneRules: unknown[];
  parkingRules: unknown[];
  sanitaryProfiles: unknown[];
  useSanitaryProfiles: unknown[];
}

export const RULES_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS use_types (
    code TEXT PRIMARY KEY,
    label TEXT NOT NULL,
    category TEXT NOT NULL DEFAULT 'System',
    is_active INTEGER NOT NULL DEFAULT 1
  );

  CREATE TABLE IF NOT EXISTS zone_rules (
    zone_code TEXT NOT NULL,
    use_type_code TEXT NOT NULL,
    occupancy_max REAL,
    permeability_min REAL,
    floor_area_min REAL,
    floor_area_max REAL,
    basement_occupancy_max REAL,
    front_setback_m REAL,
    side_setback_m REAL,
    rear_setback_m REAL,
    height_limit_m REAL,
    height_limit_floors INTEGER,
    min_lot_area_m2 REAL,
    max_lot_area_m2 REAL,
    min_frontage_mid_block_m REAL,
    min_frontage_corner_m REAL,
    max_frontage_m REAL,
    allow_attach_one_side INTEGER NOT NULL DEFAULT 0,
    allow_build_to_line INTEGER NOT NULL DEFAULT 0,
    notes TEXT,
    source_ref TEXT,
    PRIMARY KEY (zone_code, use_type_code)
  );

  CREATE TABLE IF NOT EXISTS parking_rules (
    use_code TEXT PRIMARY KEY,
    rule_json TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS sanitary_profiles (
    sanitary_profile TEXT PRIMARY KEY,
    title TEXT,
    rule_json TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS use_sanitary_profile (
    use_type_code TEXT PRIMARY KEY,
    sanitary_profile TEXT NOT NULL
  );
`;

interface ZoneRuleRow {
  zone_code: string;
  use_type_code: string;
  occupancy_max: number | null;
  permeability_min: number | null;
  floor_area_min: number | null;
  floor_area_max: number | null;
  basement_occupancy_max: number | null;
  front_setback_m: number | null;
  side_setback_m: number | null;
  rear_setback_m: number | null;
  height_limit_m: number | null;
  height_limit_floors: number | null;
  min_lot_area_m2: number | null;
  max_lot_area_m2: number | null;
  min_frontage_mid_block_m: number | null;
  min_frontage_corner_m: number | null;
  max_frontage_m: number | null;
  allow_attach_one_side: number;
  allow_build_to_line: number;
  notes: string | null;
  source_ref: string | null;
}

const rowToRecord = (row: ZoneRuleRow): Record<string, unknown> => ({
  zoneCode: row.zone_code,
  useTypeCode: row.use_type_code,
  occupancyMax: row.occupancy_max,
  permeabilityMin: row.permeability_min,
  floorAreaMin: row.floor_area_min,
  floorAreaMax: row.floor_area_max,
  basementOccupancyMax: row.basement_occupancy_max,
  frontSetbackM: row.front_setback_m,
  sideSetbackM: row.side_setback_m,
  rearSetbackM: row.rear_setback_m,
  heightLimitM: row.height_limit_m,
  heightLimitFloors: row.height_limit_floors,
  minLotAreaM2: row.min_lot_area_m2,
  maxLotAreaM2: row.max_lot_area_m2,
  minFrontageMidBlockM: row.min_frontage_mid_block_m,
  minFrontageCornerM: row.min_frontage_corner_m,
  maxFrontageM: row.max_frontage_m,
  allowAttachOneSide: row.allow_attach_one_side === 1,
  allowBuildToLine: row.allow_build_to_line === 1,
  notes: row.notes,
  sourceRef: row.source_ref,
});

const describeFailure = (lookup: RuleLookup<unknown>): string =>
  lookup.status === 'invalid' ? lookup.errors.join('; ') : 'empty document';

function parseJsonColumn(json: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(json) };
  } catch (err) {
    return { ok: false, error: `rule_json is not valid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }
}

export class SqliteRulesRepository implements RulesRepository {
  private readonly stmtZoneRule: Database.Statement<[string, string], ZoneRuleRow>;
  private readonly stmtParking: Database.Statement<[string], { rule_json: string }>;
  private readonly stmtSanitary: Database.Statement<[string], { rule_json: string }>;
  private readonly stmtUseTypes: Database.Statement<[], { code: string; label: string; category: string }>;

  constructor(private readonly db: Database.Database) {
    this.stmtZoneRule = db.prepare<[string, string], ZoneRuleRow>(
      'SELECT * FROM zone_rules WHERE zone_code = ? AND use_type_code = ? LIMIT 1'
    );
    this.stmtParking = db.prepare<[string], { rule_json: string }>(
      'SELECT rule_json FROM parking_rules WHERE use_code = ? LIMIT 1'
    );
    this.stmtSanitary = db.prepare<[string], { rule_json: string }>(`
      SELECT p.rule_json FROM use_sanitary_profile u
      JOIN sanitary_profiles p ON p.sanitary_profile = u.sanitary_profile
      WHERE u.use_type_code = ?
      LIMIT 1
    `);
    this.stmtUseTypes = db.prepare<[], { code: string; label: string; category: string }>(
      'SELECT code, label, category FROM use_types WHERE is_active = 1 ORDER BY category, label'
    );
  }

  /**
   * Opens a rules database file. Production opens it read-only.
   */
  static open(filePath: string, { readonly = true }: { readonly?: boolean } = {}): SqliteRulesRepository {
    const db = new Database(filePath, { readonly, fileMustExist: readonly });
    return new SqliteRulesRepository(db);
  }

  /**
   * In-memory database with the schema created and `seed` loaded.
   */
  static inMemory(seed: RulesSeed): SqliteRulesRepository {
    const db = new Database(':memory:');
    db.exec(RULES_SCHEMA_SQL);
    seedRules(db, seed);
    return new SqliteRulesRepository(db);
  }

  getZoneRule(zoneCode: string, useTypeCode: string): RuleLookup<RegulatoryRecord> {
    if (!zoneCode || !useTypeCode) return { status: 'not_found' };
    const row = this.stmtZoneRule.get(zoneCode, useTypeCode);
    if (!row) return { status: 'not_found' };

    const result = validateRule(regulatoryRecordSchema, rowToRecord(row));
    if (result.status === 'invalid') {
      log.warn('Invalid zone rule row', { zoneCode, useTypeCode, errors: result.errors });
    }
    return result;
  }

  getParkingRule(useCode: string): RuleLookup<ParkingRuleRecord> {
    if (!useCode) return { status: 'not_found' };
    const row = this.stmtParking.get(useCode);
    return row ? this.decode(parkingRuleRecordSchema, row.rule_json, { table: 'parking_rules', useCode }) : { status: 'not_found' };
  }

  getSanitaryProfileForUse(useCode: string): RuleLookup<SanitaryProfile> {
    if (!useCode) return { status: 'not_found' };
    const row = this.stmtSanitary.get(useCode);
    return row ? this.decode(sanitaryProfileSchema, row.rule_json, { table: 'sanitary_profiles', useCode }) : { status: 'not_found' };
  }

  listUseTypes(): UseType[] {
    return this.stmtUseTypes.all();
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  private decode<T>(
    schema: ObjectSchema<T>,
    json: string,
    context: Record<string, string>
  ): RuleLookup<T> {
    const parsed = parseJsonColumn(json);
    const result: RuleLookup<T> = parsed.ok
      ? validateRule(schema, parsed.value)
      : { status: 'invalid', errors: [parsed.error] };
    if (result.status === 'invalid') {
      log.warn('Invalid rule document', { ...context, errors: result.errors });
    }
    return result;
  }
}

/**
 * Inserts (or replaces) every record of `seed`. Documents are validated
 * first; invalid ones are skipped and reported.
 */
export function seedRules(db: Database.Database, seed: RulesSeed): { inserted: number; skipped: string[] } {
  const skipped: string[] = [];
  let inserted = 0;

  const insertUseType = db.prepare<[string, string, string]>(
    'INSERT OR REPLACE INTO use_types (code, label, category) VALUES (?, ?, ?)'
  );
  const insertZoneRule = db.prepare<Record<string, unknown>>(`
    INSERT OR REPLACE INTO zone_rules VALUES (
      @zoneCode, @useTypeCode, @occupancyMax, @permeabilityMin, @floorAreaMin, @floorAreaMax,
      @basementOccupancyMax, @frontSetbackM, @sideSetbackM, @rearSetbackM, @heightLimitM,
      @heightLimitFloors, @minLotAreaM2, @maxLotAreaM2, @minFrontageMidBlockM, @minFrontageCornerM,
      @maxFrontageM, @allowAttachOneSide, @allowBuildToLine, @notes, @sourceRef
    )
  `);
  const insertParking = db.prepare<[string, string]>(
    'INSERT OR REPLACE INTO parking_rules (use_code, rule_json) VALUES (?, ?)'
  );
  const insertProfile = db.prepare<[string, string, string]>(
    'INSERT OR REPLACE INTO sanitary_profiles (sanitary_profile, title, rule_json) VALUES (?, ?, ?)'
  );
  const insertUseProfile = db.prepare<[string, string]>(
    'INSERT OR REPLACE INTO use_sanitary_profile (use_type_code, sanitary_profile) VALUES (?, ?)'
  );

  const run = db.transaction(() => {
    for (const document of seed.useTypes) {
      const checked = validateRule(useTypeSchema, document);
      if (checked.status !== 'found') {
        skipped.push(`use type: ${describeFailure(checked)}`);
        continue;
      }
      insertUseType.run(checked.record.code, checked.record.label, checked.record.category);
      inserted++;
    }

    for (const document of seed.zoneRules) {
      const checked = validateRule(regulatoryRecordSchema, document);
      if (checked.status !== 'found') {
        skipped.push(`zone rule: ${describeFailure(checked)}`);
        continue;
      }
      insertZoneRule.run({
        ...checked.record,
        allowAttachOneSide: checked.record.allowAttachOneSide ? 1 : 0,
        allowBuildToLine: checked.record.allowBuildToLine ? 1 : 0,
      });
      inserted++;
    }

    for (const document of seed.parkingRules) {
      const checked = validateRule(parkingRuleRecordSchema, document);
      if (checked.status !== 'found') {
        skipped.push(`parking rule: ${describeFailure(checked)}`);
        continue;
      }
      insertParking.run(checked.record.useCode, JSON.stringify(document));
      inserted++;
    }

    for (const document of seed.sanitaryProfiles) {
      const checked = validateRule(sanitaryProfileSchema, document);
      if (checked.status !== 'found') {
        skipped.push(`sanitary profile: ${describeFailure(checked)}`);
        continue;
      }
      insertProfile.run(checked.record.profileCode, checked.record.title, JSON.stringify(document));
      inserted++;
    }

    for (const document of seed.useSanitaryProfiles) {
      const checked = validateRule(useSanitaryLinkSchema, document);
      if (checked.status !== 'found') {
        skipped.push(`use sanitary profile: ${describeFailure(checked)}`);
        continue;
      }
      insertUseProfile.run(checked.record.useTypeCode, checked.record.profileCode);
      inserted++;
    }
  });
  run();

  if (skipped.length > 0) {
    log.warn('Skipped invalid rule records while seeding', { skipped });
  }
  return { inserted, skipped };
}
