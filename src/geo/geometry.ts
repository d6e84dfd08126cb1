/**
 * src/geo/geometry.ts
 *
 * Wraps GeoJSON geometry objects into handles supporting the three tests the
 * spatial indexes need: strict containment, boundary-inclusive intersection
 * and planar distance. Decoding never throws; a malformed geometry comes back
 * as a failure result so the loader can skip that one feature.
 */

import { bbox as turfBbox, booleanPointInPolygon, booleanPointOnLine } from '@turf/turf';
import type { BBox, LineString, MultiLineString, MultiPolygon, Polygon, Position } from 'geojson';

export type AreaGeometry = Polygon | MultiPolygon;
export type LinearGeometry = LineString | MultiLineString;
export type SupportedGeometry = AreaGeometry | LinearGeometry;

export type GeometryKind = 'area' | 'line';

export type GeometryResult<T> =
  | { status: 'success'; geometry: T }
  | { status: 'failure'; error: string };

export interface GeometryHandle {
  readonly kind: GeometryKind;
  readonly bbox: BBox;
  /** Strictly inside; boundary points are not contained. */
  contains(point: Position): boolean;
  /** Inside or on the boundary (areas) / on the line (lines). */
  intersects(point: Position): boolean;
  /** Planar Euclidean distance in the geometry's own units; 0 when intersecting. */
  distance(point: Position): number;
}

// -------------------------
// Decoding
// -------------------------

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isPosition = (value: unknown): value is Position =>
  Array.isArray(value) &&
  value.length >= 2 &&
  value.every(v => typeof v === 'number' && Number.isFinite(v));

const isPositionList = (value: unknown, minLength: number): value is Position[] =>
  Array.isArray(value) && value.length >= minLength && value.every(isPosition);

const isClosedRing = (value: unknown): value is Position[] => {
  if (!isPositionList(value, 4)) return false;
  const first = value[0];
  const last = value[value.length - 1];
  return first[0] === last[0] && first[1] === last[1];
};

const isRingList = (value: unknown): value is Position[][] =>
  Array.isArray(value) && value.length >= 1 && value.every(isClosedRing);

const isPolygonList = (value: unknown): value is Position[][][] =>
  Array.isArray(value) && value.length >= 1 && value.every(isRingList);

const isLineList = (value: unknown): value is Position[][] =>
  Array.isArray(value) && value.length >= 1 && value.every(line => isPositionList(line, 2));

/**
 * Validates an untyped GeoJSON geometry object. Only polygonal and linear
 * geometries are accepted.
 */
export function parseGeometry(raw: unknown): GeometryResult<SupportedGeometry> {
  if (!isRecord(raw)) {
    return { status: 'failure', error: 'Geometry is missing or not an object' };
  }
  const { type, coordinates } = raw;

  switch (type) {
    case 'Polygon':
      return isRingList(coordinates)
        ? { status: 'success', geometry: { type: 'Polygon', coordinates } }
        : { status: 'failure', error: 'Polygon rings must be closed with at least 4 finite positions' };
    case 'MultiPolygon':
      return isPolygonList(coordinates)
        ? { status: 'success', geometry: { type: 'MultiPolygon', coordinates } }
        : { status: 'failure', error: 'MultiPolygon must hold at least one valid polygon' };
    case 'LineString':
      return isPositionList(coordinates, 2)
        ? { status: 'success', geometry: { type: 'LineString', coordinates } }
        : { status: 'failure', error: 'LineString needs at least 2 finite positions' };
    case 'MultiLineString':
      return isLineList(coordinates)
        ? { status: 'success', geometry: { type: 'MultiLineString', coordinates } }
        : { status: 'failure', error: 'MultiLineString must hold lines of at least 2 finite positions' };
    default:
      return { status: 'failure', error: `Unsupported geometry type: ${String(type)}` };
  }
}

export const isAreaGeometry = (geometry: SupportedGeometry): geometry is AreaGeometry =>
  geometry.type === 'Polygon' || geometry.type === 'MultiPolygon';

export const isLinearGeometry = (geometry: SupportedGeometry): geometry is LinearGeometry =>
  geometry.type === 'LineString' || geometry.type === 'MultiLineString';

// -------------------------
// Planar distance helpers
// -------------------------

export function pointSegmentDistance(p: Position, a: Position, b: Position): number {
  const dx = b[0] - a[0];
  const dy = b[1] - a[1];
  const lengthSq = dx * dx + dy * dy;
  const t =
    lengthSq === 0 ? 0 : Math.max(0, Math.min(1, ((p[0] - a[0]) * dx + (p[1] - a[1]) * dy) / lengthSq));
  return Math.hypot(p[0] - (a[0] + t * dx), p[1] - (a[1] + t * dy));
}

function pointPathDistance(p: Position, path: Position[]): number {
  if (path.length === 1) return Math.hypot(p[0] - path[0][0], p[1] - path[0][1]);
  let best = Infinity;
  for (let i = 1; i < path.length; i++) {
    best = Math.min(best, pointSegmentDistance(p, path[i - 1], path[i]));
  }
  return best;
}

const pathsOf = (geometry: SupportedGeometry): Position[][] => {
  switch (geometry.type) {
    case 'LineString':
      return [geometry.coordinates];
    case 'MultiLineString':
    case 'Polygon':
      return geometry.coordinates;
    case 'MultiPolygon':
      return geometry.coordinates.flat();
  }
};

// -------------------------
// Handles
// -------------------------

class AreaHandle implements GeometryHandle {
  readonly kind = 'area';
  readonly bbox: BBox;

  constructor(private readonly geometry: AreaGeometry) {
    this.bbox = turfBbox(geometry);
  }

  contains(point: Position): boolean {
    return booleanPointInPolygon(point, this.geometry, { ignoreBoundary: true });
  }

  intersects(point: Position): boolean {
    return booleanPointInPolygon(point, this.geometry);
  }

  distance(point: Position): number {
    if (this.intersects(point)) return 0;
    return Math.min(...pathsOf(this.geometry).map(ring => pointPathDistance(point, ring)));
  }
}

class LineHandle implements GeometryHandle {
  readonly kind = 'line';
  readonly bbox: BBox;
  private readonly paths: Position[][];

  constructor(private readonly geometry: LinearGeometry) {
    this.bbox = turfBbox(geometry);
    this.paths = pathsOf(geometry);
  }

  contains(): boolean {
    return false;
  }

  intersects(point: Position): boolean {
    if (this.geometry.type === 'LineString') {
      return booleanPointOnLine(point, this.geometry);
    }
    return this.geometry.coordinates.some(coordinates =>
      booleanPointOnLine(point, { type: 'LineString', coordinates })
    );
  }

  distance(point: Position): number {
    let best = Infinity;
    for (const path of this.paths) {
      best = Math.min(best, pointPathDistance(point, path));
    }
    return best;
  }
}

/**
 * Wraps an already validated geometry.
 */
export function wrapGeometry(geometry: SupportedGeometry): GeometryHandle {
  return isAreaGeometry(geometry) ? new AreaHandle(geometry) : new LineHandle(geometry);
}

/**
 * Decodes and wraps a raw geometry in one step.
 */
export function createGeometry(raw: unknown): GeometryResult<GeometryHandle> {
  const parsed = parseGeometry(raw);
  if (parsed.status === 'failure') return parsed;
  return { status: 'success', geometry: wrapGeometry(parsed.geometry) };
}
