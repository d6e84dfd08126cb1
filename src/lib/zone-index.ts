/**
 * src/lib/zone-index.ts
 *
 * Point-in-polygon lookups over the zoning layer. A bbox prefilter yields the
 * candidate polygons; each is tested for strict containment first and then
 * for boundary contact, so a click right on a zone edge still matches.
 *
 * Overlapping zones (or a click on a shared edge) resolve to the candidate
 * loaded first. No distance-based disambiguation is attempted.
 */

import { BBoxStore } from './bbox-store';
import { decodeFeatures } from './feature-decoder';
import { isAreaGeometry } from '../geo/geometry';
import type { GeometryHandle } from '../geo/geometry';
import type { FeatureProperties, LonLat, SourceFeature } from '../types';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('zone-index');

export class ZoneSpatialIndex {
  private constructor(
    private readonly geometries: GeometryHandle[],
    private readonly properties: FeatureProperties[],
    private readonly boxes: BBoxStore,
    readonly skipped: number
  ) {}

  static build(features: readonly SourceFeature[]): ZoneSpatialIndex {
    const { geometries, properties, skipped } = decodeFeatures(features, isAreaGeometry);
    const boxes = new BBoxStore(geometries.map(g => g.bbox));

    log.info('Zone index built', { zones: geometries.length, skipped });
    return new ZoneSpatialIndex(geometries, properties, boxes, skipped);
  }

  get size(): number {
    return this.geometries.length;
  }

  /**
   * Properties of the zone containing or touching the point, or null when the
   * point falls outside every zone.
   */
  findZone([lon, lat]: LonLat): FeatureProperties | null {
    if (this.size === 0 || !Number.isFinite(lon) || !Number.isFinite(lat)) return null;

    const point = [lon, lat];
    for (const handle of this.boxes.candidatesAt(lon, lat)) {
      const slot = this.boxes.slotOf(handle);
      if (slot === undefined) continue;

      const geometry = this.geometries[slot];
      if (geometry.contains(point) || geometry.intersects(point)) {
        return this.properties[slot];
      }
    }

    log.debug('Point outside every zone', { lon, lat });
    return null;
  }

  close(): void {
    this.boxes.close();
  }
}
