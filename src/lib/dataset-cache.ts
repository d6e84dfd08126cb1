/**
 * src/lib/dataset-cache.ts
 *
 * Loads the zoning and street GeoJSON layers from disk and keeps the built
 * spatial indexes in memory. Indexes are memoized per dataset version (path,
 * mtime and size of both files), so reloading unchanged files is free and a
 * replaced file gets a fresh index.
 */

import fs from 'fs';
import path from 'path';
import { LRUCache } from '../utils/LRUCache';
import { IndexNotBuiltError } from '../utils/errors';
import { moduleLogger } from '../utils/logger';
import { normalizeZoneProperties } from './property-aliases';
import { StreetSpatialIndex } from './street-index';
import { ZoneSpatialIndex } from './zone-index';
import type { SpatialIndexes } from '../functions/resolveLocation';
import type { FeatureProperties, PropertyValue, SourceFeature } from '../types';

const log = moduleLogger('dataset-cache');

export interface DatasetPaths {
  zonesFile: string;
  streetsFile: string;
}

export type LoadResult =
  | { status: 'success'; message: string; zones: number; streets: number }
  | { status: 'error'; error: string };

const isScalar = (value: unknown): value is PropertyValue =>
  value === null || ['string', 'number', 'boolean'].includes(typeof value);

const toProperties = (raw: unknown): FeatureProperties => {
  const properties: FeatureProperties = {};
  if (typeof raw !== 'object' || raw === null) return properties;
  for (const [key, value] of Object.entries(raw)) {
    if (isScalar(value)) properties[key] = value;
  }
  return properties;
};

/**
 * Turns a parsed GeoJSON FeatureCollection into geometry/property pairs.
 * Geometries stay undecoded; the indexes validate them one by one.
 */
export function toSourceFeatures(collection: unknown): SourceFeature[] {
  if (typeof collection !== 'object' || collection === null || !('features' in collection)) {
    throw new Error('Not a GeoJSON FeatureCollection: missing "features"');
  }
  const { features } = collection;
  if (!Array.isArray(features)) {
    throw new Error('Not a GeoJSON FeatureCollection: "features" is not an array');
  }

  return features.map((feature: unknown): SourceFeature => {
    if (typeof feature !== 'object' || feature === null) {
      return { geometry: null, properties: {} };
    }
    return {
      geometry: 'geometry' in feature ? feature.geometry : null,
      properties: toProperties('properties' in feature ? feature.properties : null),
    };
  });
}

export async function loadFeatureCollection(filePath: string): Promise<SourceFeature[]> {
  const content = await fs.promises.readFile(filePath, 'utf-8');
  return toSourceFeatures(JSON.parse(content));
}

/**
 * Builds both indexes from in-memory features. Zone properties are normalized
 * so the recognized display keys always exist.
 */
export function buildIndexes(
  zoneFeatures: readonly SourceFeature[],
  streetFeatures: readonly SourceFeature[]
): SpatialIndexes {
  const normalizedZones = zoneFeatures.map(feature => ({
    geometry: feature.geometry,
    properties: normalizeZoneProperties(feature.properties),
  }));
  return {
    zones: ZoneSpatialIndex.build(normalizedZones),
    streets: StreetSpatialIndex.build(streetFeatures),
  };
}

async function datasetVersion(filePath: string): Promise<string> {
  const absolute = path.resolve(filePath);
  try {
    const stats = await fs.promises.stat(absolute);
    return `${absolute}:${stats.mtimeMs}:${stats.size}`;
  } catch {
    return `${absolute}:missing`;
  }
}

export class SpatialIndexCache {
  private readonly cache: LRUCache<string, SpatialIndexes>;
  private readonly pending = new Map<string, Promise<SpatialIndexes>>();
  private current: SpatialIndexes | null = null;

  constructor(maxVersions: number) {
    this.cache = new LRUCache<string, SpatialIndexes>(maxVersions, (key, indexes) => {
      log.info('Evicting spatial indexes', { key });
      if (indexes !== this.current) {
        indexes.zones.close();
        indexes.streets.close();
      }
    });
  }

  /**
   * Loads (or reuses) the indexes for the given files and makes them current.
   * The zoning layer is required; a missing street layer yields an empty index.
   */
  async load({ zonesFile, streetsFile }: DatasetPaths): Promise<LoadResult> {
    let result: LoadResult = { status: 'error', error: 'Unknown error' };
    try {
      const key = `${await datasetVersion(zonesFile)}|${await datasetVersion(streetsFile)}`;
      let indexes = this.cache.get(key);

      if (!indexes) {
        // Overlapping loads of the same version share one build
        let build = this.pending.get(key);
        if (!build) {
          build = this.buildFromFiles(key, { zonesFile, streetsFile }).finally(() => this.pending.delete(key));
          this.pending.set(key, build);
        }
        indexes = await build;
      } else {
        log.debug('Reusing memoized spatial indexes', { key });
      }
      this.current = indexes;

      result = {
        status: 'success',
        message: `Indexed ${indexes.zones.size} zones and ${indexes.streets.size} streets`,
        zones: indexes.zones.size,
        streets: indexes.streets.size,
      };
    } catch (err) {
      log.error('Error loading spatial datasets', { error: err instanceof Error ? err.message : String(err) });
      result = { status: 'error', error: err instanceof Error ? err.message : String(err) };
    }
    return result;
  }

  private async buildFromFiles(key: string, { zonesFile, streetsFile }: DatasetPaths): Promise<SpatialIndexes> {
    const zoneFeatures = await loadFeatureCollection(zonesFile);
    const streetFeatures = fs.existsSync(streetsFile) ? await loadFeatureCollection(streetsFile) : [];
    if (streetFeatures.length === 0) {
      log.warn('Street layer missing or empty; nearest-street lookups will return none', {
        streetsFile,
      });
    }
    return this.remember(key, buildIndexes(zoneFeatures, streetFeatures));
  }

  /**
   * Makes already-built indexes current, memoized under `key`.
   */
  use(key: string, build: () => SpatialIndexes): SpatialIndexes {
    const hit = this.cache.get(key);
    if (hit) {
      this.current = hit;
      return hit;
    }
    return this.remember(key, build());
  }

  // Current is switched before caching, so an evicted predecessor gets closed
  private remember(key: string, indexes: SpatialIndexes): SpatialIndexes {
    this.current = indexes;
    this.cache.set(key, indexes);
    return indexes;
  }

  get isLoaded(): boolean {
    return this.current !== null;
  }

  /**
   * Current indexes; calling this before a successful load is a programming error.
   */
  get(): SpatialIndexes {
    if (!this.current) {
      throw new IndexNotBuiltError('Spatial index');
    }
    return this.current;
  }

  close(): void {
    this.current = null;
    this.cache.clear();
  }
}
