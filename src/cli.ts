#!/usr/bin/env node

import { Command } from 'commander';
import fetch from 'node-fetch';
import fs from 'fs/promises';
import { config } from './config';

const program = new Command();

const DEFAULT_HOST = `http://localhost:${config.port}`;

interface HostOption {
  host: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const field = (value: unknown, key: string): unknown => (isRecord(value) ? value[key] : undefined);

const parseNumber = (label: string, raw: string | undefined): number => {
  const value = Number(raw);
  if (raw === undefined || raw.trim() === '' || !Number.isFinite(value)) {
    console.error(`Error: ${label} must be a valid number`);
    process.exit(1);
  }
  return value;
};

async function request(host: string, path: string, body?: unknown): Promise<{ ok: boolean; data: unknown }> {
  const response = await fetch(`${host}${path}`, {
    method: body === undefined ? 'GET' : 'POST',
    headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  const data: unknown = await response.json();
  return { ok: response.ok, data };
}

function failOnError({ ok, data }: { ok: boolean; data: unknown }): void {
  if (ok) return;
  console.error('Error:', String(field(data, 'message') ?? 'Unknown error'));
  const details = field(data, 'details');
  if (Array.isArray(details)) {
    for (const detail of details) console.error(`  - ${String(detail)}`);
  }
  process.exit(1);
}

function describeLocation(result: unknown): string {
  const zone = String(field(result, 'zoneCode') || '(no zone)');
  const street = String(field(result, 'streetName') || '(no street nearby)');
  const distance = field(result, 'streetDistanceM');
  return typeof distance === 'number' ? `${zone} | ${street} (${distance.toFixed(1)} m)` : `${zone} | ${street}`;
}

program
  .name('lot-viability-cli')
  .description('CLI client for the lot viability API')
  .version('1.0.0');

program
  .command('lookup')
  .description('Resolve the zone and nearest street for a coordinate')
  .requiredOption('--lat <number>', 'Latitude')
  .requiredOption('--lon <number>', 'Longitude')
  .option('--max-distance <meters>', 'Maximum street distance in meters')
  .option('--host <string>', 'API host', DEFAULT_HOST)
  .action(async (options: HostOption & { lat: string; lon: string; maxDistance?: string }) => {
    try {
      const lat = parseNumber('Latitude', options.lat);
      const lon = parseNumber('Longitude', options.lon);
      const query = new URLSearchParams({ lat: String(lat), lon: String(lon) });
      if (options.maxDistance !== undefined) {
        query.set('maxDistance', String(parseNumber('Max distance', options.maxDistance)));
      }

      console.log(`Looking up location for: ${lat}, ${lon}`);
      console.log(`Using API at: ${options.host}`);

      const result = await request(options.host, `/location?${query.toString()}`);
      failOnError(result);

      console.log('\nResult:');
      console.log(JSON.stringify(result.data, null, 2));
      console.log(field(result.data, 'zoneCode') ? `\n✓ ${describeLocation(result.data)}` : '\n✗ No zone found at these coordinates');
    } catch (error) {
      console.error('Error:', error);
      process.exit(1);
    }
  });

program
  .command('batch')
  .description('Resolve many coordinates from a JSON file')
  .requiredOption('-f, --file <path>', 'Path to JSON file with an array of {"lat", "lon"} objects')
  .option('--host <string>', 'API host', DEFAULT_HOST)
  .action(async (options: HostOption & { file: string }) => {
    try {
      const coordinates: unknown = JSON.parse(await fs.readFile(options.file, 'utf-8'));

      if (!Array.isArray(coordinates)) {
        console.error('Error: File must contain a JSON array of coordinate objects');
        console.error('Example: [{"lat": -25.43, "lon": -49.27}, {"lat": -25.44, "lon": -49.28}]');
        process.exit(1);
      }

      console.log(`Processing ${coordinates.length} coordinates...`);
      console.log(`Using API at: ${options.host}`);

      const result = await request(options.host, '/location/batch', { coordinates });
      failOnError(result);

      const results = field(result.data, 'results');
      const list: unknown[] = Array.isArray(results) ? results : [];
      list.forEach((entry, index) => {
        const mark = field(entry, 'zoneCode') ? '✓' : '✗';
        console.log(`  [${index}] ${mark} ${describeLocation(entry)}`);
      });

      const found = list.filter(entry => Boolean(field(entry, 'zoneCode'))).length;
      console.log(`\nSummary: ${found}/${list.length} coordinates inside a zone`);
    } catch (error) {
      console.error('Error:', error);
      process.exit(1);
    }
  });

program
  .command('viability')
  .description('Compute the urbanistic limits, parking and sanitary requirements for a lot')
  .requiredOption('--use <code>', 'Use type code')
  .requiredOption('--frontage <meters>', 'Lot frontage in meters')
  .requiredOption('--depth <meters>', 'Lot depth in meters')
  .option('--zone <code>', 'Zone code (otherwise resolved from --lat/--lon)')
  .option('--lat <number>', 'Latitude')
  .option('--lon <number>', 'Longitude')
  .option('--corner', 'Corner lot', false)
  .option('--two-frontages', 'Corner lot with two street frontages', false)
  .option('--attach-one-side', 'Build attached to one side boundary', false)
  .option('--area <m2>', 'Desired total built area')
  .option('--floors <n>', 'Desired number of floors')
  .option('--host <string>', 'API host', DEFAULT_HOST)
  .action(
    async (
      options: HostOption & {
        use: string;
        frontage: string;
        depth: string;
        zone?: string;
        lat?: string;
        lon?: string;
        corner: boolean;
        twoFrontages: boolean;
        attachOneSide: boolean;
        area?: string;
        floors?: string;
      }
    ) => {
      if (!options.zone && (options.lat === undefined || options.lon === undefined)) {
        console.error('Error: Either --zone or both --lat and --lon are required');
        process.exit(1);
      }
      try {
        const body = {
          useTypeCode: options.use,
          ...(options.zone ? { zoneCode: options.zone } : {}),
          ...(options.lat !== undefined && options.lon !== undefined
            ? { lat: parseNumber('Latitude', options.lat), lon: parseNumber('Longitude', options.lon) }
            : {}),
          lot: {
            frontageM: parseNumber('Frontage', options.frontage),
            depthM: parseNumber('Depth', options.depth),
            isCorner: options.corner,
            cornerHasTwoFrontages: options.twoFrontages,
            attachOneSide: options.attachOneSide,
          },
          project: {
            ...(options.area !== undefined ? { desiredTotalAreaM2: parseNumber('Area', options.area) } : {}),
            ...(options.floors !== undefined ? { desiredFloors: parseNumber('Floors', options.floors) } : {}),
          },
        };

        const result = await request(options.host, '/viability', body);
        failOnError(result);

        console.log(JSON.stringify(result.data, null, 2));

        const simulation = field(result.data, 'simulation');
        if (isRecord(simulation)) {
          console.log(simulation.viable ? '\n✓ Project is viable' : '\n✗ Project is not viable');
          const reasons = simulation.reasons;
          if (Array.isArray(reasons)) {
            for (const reason of reasons) console.log(`  - ${String(reason)}`);
          }
        } else {
          console.log('\n✗ No regulatory record for this zone and use');
        }
      } catch (error) {
        console.error('Error:', error);
        process.exit(1);
      }
    }
  );

program
  .command('use-types')
  .description('List the registered use types')
  .option('--host <string>', 'API host', DEFAULT_HOST)
  .action(async (options: HostOption) => {
    try {
      const result = await request(options.host, '/use-types');
      failOnError(result);
      const useTypes = field(result.data, 'useTypes');
      for (const useType of Array.isArray(useTypes) ? useTypes : []) {
        console.log(`${String(field(useType, 'code'))}\t${String(field(useType, 'label'))}`);
      }
    } catch (error) {
      console.error('Error:', error);
      process.exit(1);
    }
  });

program
  .command('health')
  .description('Check if the API is running')
  .option('--host <string>', 'API host', DEFAULT_HOST)
  .action(async (options: HostOption) => {
    try {
      console.log(`Checking API health at: ${options.host}`);
      const { ok, data } = await request(options.host, '/health');

      if (ok && field(data, 'status') === 'ok') {
        console.log('✓ API is healthy and running');
      } else {
        console.log('✗ API health check failed');
        process.exit(1);
      }
    } catch (error) {
      console.log('✗ Could not connect to API');
      console.error('Error:', error);
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch(error => {
  console.error('Error:', error);
  process.exit(1);
});
