/**
 * Geographic (EPSG:4326, degrees) <-> spherical Web Mercator (EPSG:3857, meters).
 *
 * Mercator inflates lengths by 1/cos(latitude); at municipal scale the factor
 * is constant enough that nearest-street ordering and a ~100 m radius hold.
 */

import { toMercator, toWgs84 } from '@turf/turf';
import type { Position } from 'geojson';
import type { SupportedGeometry } from './geometry';
import type { LonLat, ProjectedXY } from '../types';

export function projectPosition(lonLat: LonLat): ProjectedXY {
  return toMercator(lonLat);
}

export function unprojectPosition(xy: ProjectedXY): LonLat {
  return toWgs84(xy);
}

/**
 * Projects every vertex of a geometry; the input is left untouched.
 */
export function projectGeometry<G extends SupportedGeometry>(geometry: G): G {
  return toMercator(geometry);
}

export const toLonLat = (lat: number, lon: number): Position => [lon, lat];
