#!/usr/bin/env node

/**
 * Builds the rules database from the JSON seeds in data/rules.
 *
 * Run after editing any seed file; the API opens the result read-only.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { config } from './config';
import { RULES_SCHEMA_SQL, seedRules, type RulesSeed } from './lib/rules-repository';

// Paths are relative to the working directory, like the dataset settings.
const SEED_DIR = path.resolve('data/rules');
const DEFAULT_DB_PATH = path.resolve(config.datasets.rulesDbPath);

const SEED_FILES: Record<keyof RulesSeed, string> = {
  useTypes: 'use-types.json',
  zoneRules: 'zone-rules.json',
  parkingRules: 'parking-rules.json',
  sanitaryProfiles: 'sanitary-profiles.json',
  useSanitaryProfiles: 'use-sanitary-profiles.json',
};

function readSeedArray(seedDir: string, fileName: string): unknown[] {
  const filePath = path.join(seedDir, fileName);
  if (!fs.existsSync(filePath)) {
    console.log(`⚠️  Seed file not found, skipping: ${filePath}`);
    return [];
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`Seed file ${filePath} must contain a JSON array`);
  }
  return parsed;
}

export function loadRulesSeed(seedDir: string = SEED_DIR): RulesSeed {
  return {
    useTypes: readSeedArray(seedDir, SEED_FILES.useTypes),
    zoneRules: readSeedArray(seedDir, SEED_FILES.zoneRules),
    parkingRules: readSeedArray(seedDir, SEED_FILES.parkingRules),
    sanitaryProfiles: readSeedArray(seedDir, SEED_FILES.sanitaryProfiles),
    useSanitaryProfiles: readSeedArray(seedDir, SEED_FILES.useSanitaryProfiles),
  };
}

export function createRulesDatabase(dbPath: string = DEFAULT_DB_PATH, seedDir: string = SEED_DIR): void {
  console.log('📦 Creating rules database from JSON seeds...');
  console.log(`   Source: ${seedDir}`);
  console.log(`   Target: ${dbPath}`);

  fs.mkdirSync(path.dirname(dbPath), { recursive: true });

  if (fs.existsSync(dbPath)) {
    console.log('⚠️  Removing existing database...');
    fs.unlinkSync(dbPath);
  }

  const db = new Database(dbPath);

  try {
    db.exec(RULES_SCHEMA_SQL);

    console.log('🔄 Seeding rules...');
    const { inserted, skipped } = seedRules(db, loadRulesSeed(seedDir));

    console.log(`✅ Inserted ${inserted} records`);
    if (skipped.length > 0) {
      console.log(`⚠️  Skipped ${skipped.length} invalid records:`);
      for (const entry of skipped) console.log(`   - ${entry}`);
    }

    console.log('🔧 Optimizing database...');
    db.exec('VACUUM');
    db.exec('ANALYZE');

    const counts = db
      .prepare<[], { useTypes: number; zoneRules: number; parkingRules: number; profiles: number }>(
        `
      SELECT
        (SELECT COUNT(*) FROM use_types) AS useTypes,
        (SELECT COUNT(*) FROM zone_rules) AS zoneRules,
        (SELECT COUNT(*) FROM parking_rules) AS parkingRules,
        (SELECT COUNT(*) FROM sanitary_profiles) AS profiles
    `
      )
      .get();

    console.log('\n' + '='.repeat(50));
    console.log('✅ Database created successfully!');
    console.log('='.repeat(50));
    console.log(`📍 Location: ${dbPath}`);
    if (counts) {
      console.log(`📊 Use types: ${counts.useTypes}`);
      console.log(`📊 Zone rules: ${counts.zoneRules}`);
      console.log(`📊 Parking rules: ${counts.parkingRules}`);
      console.log(`📊 Sanitary profiles: ${counts.profiles}`);
    }
    console.log('='.repeat(50));
  } catch (error) {
    console.error('❌ Error creating database:', error);
    throw error;
  } finally {
    db.close();
  }
}

// Run if called directly
if (require.main === module) {
  try {
    createRulesDatabase(process.argv[2] ?? DEFAULT_DB_PATH);
  } catch (error) {
    console.error('Fatal error:', error);
    process.exit(1);
  }
}
