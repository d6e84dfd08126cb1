import { parseGeometry, wrapGeometry } from '../geo/geometry';
import type { GeometryHandle, SupportedGeometry } from '../geo/geometry';
import type { FeatureProperties, SourceFeature } from '../types';

export interface DecodedFeatures {
  geometries: GeometryHandle[];
  properties: FeatureProperties[];
  skipped: number;
}

/**
 * Decodes the geometry of every feature, keeping the ones `accept` allows.
 * Rejected or malformed features are counted and dropped; the surviving
 * arrays stay aligned slot by slot.
 */
export function decodeFeatures<T extends SupportedGeometry>(
  features: readonly SourceFeature[],
  accept: (geometry: SupportedGeometry) => geometry is T,
  transform: (geometry: T) => T = geometry => geometry
): DecodedFeatures {
  const decoded: DecodedFeatures = { geometries: [], properties: [], skipped: 0 };

  for (const feature of features) {
    const parsed = parseGeometry(feature.geometry);
    if (parsed.status === 'failure' || !accept(parsed.geometry)) {
      decoded.skipped++;
      continue;
    }
    decoded.geometries.push(wrapGeometry(transform(parsed.geometry)));
    decoded.properties.push(feature.properties);
  }

  return decoded;
}
