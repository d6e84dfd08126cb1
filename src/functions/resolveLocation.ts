/**
 * src/functions/resolveLocation.ts
 *
 * Resolves a map click to its zone and nearest street, and pulls the display
 * fields out of whichever property spelling each layer uses.
 */

import { readAliased } from '../lib/property-aliases';
import type { StreetSpatialIndex } from '../lib/street-index';
import type { ZoneSpatialIndex } from '../lib/zone-index';
import { toLonLat } from '../geo/projection';
import type { LocationResult } from '../types';

export const DEFAULT_STREET_MAX_DISTANCE_M = 120;

export interface SpatialIndexes {
  zones: ZoneSpatialIndex;
  streets: StreetSpatialIndex;
}

/**
 * Looks up the zone and the nearest street for the provided coordinates.
 * Depends only on the indexes, so repeated calls return identical results.
 */
export const resolveLocation = (
  { zones, streets }: SpatialIndexes,
  {
    lat,
    lon,
    maxDistanceM = DEFAULT_STREET_MAX_DISTANCE_M,
  }: {
    lat: number;
    lon: number;
    maxDistanceM?: number;
  }
): LocationResult => {
  const point = toLonLat(lat, lon);
  const zoneProps = zones.findZone(point);
  const street = streets.findNearest(point, maxDistanceM);

  return {
    zoneCode: readAliased(zoneProps, 'zoneCode'),
    zoneName: readAliased(zoneProps, 'zoneName'),
    streetName: readAliased(street?.properties, 'streetName'),
    streetClass: readAliased(street?.properties, 'streetClass'),
    streetDistanceM: street ? street.distanceM : null,
    rawZoneProps: zoneProps ? { ...zoneProps } : {},
    rawStreetProps: street ? { ...street.properties } : {},
  };
};
