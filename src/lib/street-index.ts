/**
 * src/lib/street-index.ts
 *
 * Nearest-street lookups over the street layer. Every line is projected to
 * Web Mercator once at build time; queries project the click once and walk
 * the bbox table by increasing box distance, stopping when no remaining box
 * can beat the best exact distance. The radius only decides whether the
 * winner is reported, never which street wins.
 */

import { BBoxStore } from './bbox-store';
import { decodeFeatures } from './feature-decoder';
import { isLinearGeometry } from '../geo/geometry';
import type { GeometryHandle } from '../geo/geometry';
import { projectGeometry, projectPosition } from '../geo/projection';
import type { FeatureProperties, LonLat, SourceFeature, StreetMatch } from '../types';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('street-index');

export class StreetSpatialIndex {
  private constructor(
    private readonly geometries: GeometryHandle[],
    private readonly properties: FeatureProperties[],
    private readonly boxes: BBoxStore,
    readonly skipped: number
  ) {}

  static build(features: readonly SourceFeature[]): StreetSpatialIndex {
    const { geometries, properties, skipped } = decodeFeatures(
      features,
      isLinearGeometry,
      projectGeometry
    );
    const boxes = new BBoxStore(geometries.map(g => g.bbox));

    log.info('Street index built', { streets: geometries.length, skipped });
    return new StreetSpatialIndex(geometries, properties, boxes, skipped);
  }

  get size(): number {
    return this.geometries.length;
  }

  /**
   * Nearest street regardless of distance, or null for an empty layer.
   */
  nearest([lon, lat]: LonLat): StreetMatch | null {
    if (this.size === 0 || !Number.isFinite(lon) || !Number.isFinite(lat)) return null;

    const [x, y] = projectPosition([lon, lat]);
    let best: { slot: number; distance: number } | null = null;

    for (const candidate of this.boxes.nearestCandidates(x, y)) {
      if (best && candidate.lowerBound > best.distance) break;

      const slot = this.boxes.slotOf(candidate.handle);
      if (slot === undefined) continue;

      const distance = this.geometries[slot].distance([x, y]);
      // Boxes are visited by lower bound, not load order; ties go to the earlier street
      if (!best || distance < best.distance || (distance === best.distance && slot < best.slot)) {
        best = { slot, distance };
      }
    }

    return best ? { properties: this.properties[best.slot], distanceM: best.distance } : null;
  }

  /**
   * Nearest street within `maxDistanceM`; null when the closest one is
   * farther than that (a normal outcome for clicks away from the road grid).
   */
  findNearest(point: LonLat, maxDistanceM: number): StreetMatch | null {
    const match = this.nearest(point);
    if (!match) return null;

    if (!(match.distanceM <= maxDistanceM)) {
      log.debug('Nearest street beyond search radius', {
        distanceM: Math.round(match.distanceM),
        maxDistanceM,
      });
      return null;
    }
    return match;
  }

  close(): void {
    this.boxes.close();
  }
}
