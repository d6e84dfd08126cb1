import { ZoneSpatialIndex } from '../../lib/zone-index';
import type { SourceFeature } from '../../types';

const box = (minX: number, minY: number, maxX: number, maxY: number) => ({
  type: 'Polygon',
  coordinates: [
    [
      [minX, minY],
      [maxX, minY],
      [maxX, maxY],
      [minX, maxY],
      [minX, minY],
    ],
  ],
});

const zoneA: SourceFeature = { geometry: box(0, 0, 10, 10), properties: { sigla: 'A' } };
const zoneB: SourceFeature = { geometry: box(10, 0, 20, 10), properties: { sigla: 'B' } };

describe('ZoneSpatialIndex', () => {
  let index: ZoneSpatialIndex;

  beforeEach(() => {
    index = ZoneSpatialIndex.build([
      zoneA,
      { geometry: null, properties: { sigla: 'broken' } },
      { geometry: { type: 'LineString', coordinates: [[0, 0], [1, 1]] }, properties: { sigla: 'line' } },
      zoneB,
    ]);
  });

  afterEach(() => {
    index.close();
  });

  test('should skip missing, invalid and non-polygon geometries', () => {
    expect(index.size).toBe(2);
    expect(index.skipped).toBe(2);
  });

  test('should find the zone containing a point', () => {
    expect(index.findZone([5, 5])).toEqual({ sigla: 'A' });
    expect(index.findZone([15, 5])).toEqual({ sigla: 'B' });
  });

  test('should match points on the outer boundary', () => {
    expect(index.findZone([0, 5])).toEqual({ sigla: 'A' });
    expect(index.findZone([20, 10])).toEqual({ sigla: 'B' });
  });

  test('should resolve a shared edge to the zone loaded first', () => {
    expect(index.findZone([10, 5])).toEqual({ sigla: 'A' });

    const reversed = ZoneSpatialIndex.build([zoneB, zoneA]);
    expect(reversed.findZone([10, 5])).toEqual({ sigla: 'B' });
    reversed.close();
  });

  test('should return null outside every zone', () => {
    expect(index.findZone([25, 5])).toBeNull();
    expect(index.findZone([5, -1])).toBeNull();
  });

  test('should return null for non-finite coordinates', () => {
    expect(index.findZone([Number.NaN, 5])).toBeNull();
  });

  test('should answer null from an empty index', () => {
    const empty = ZoneSpatialIndex.build([]);
    expect(empty.size).toBe(0);
    expect(empty.findZone([5, 5])).toBeNull();
    empty.close();
  });

  test('should look into every polygon of a multipolygon', () => {
    const multi = ZoneSpatialIndex.build([
      {
        geometry: { type: 'MultiPolygon', coordinates: [box(0, 0, 1, 1).coordinates, box(5, 5, 6, 6).coordinates] },
        properties: { sigla: 'M' },
      },
    ]);
    expect(multi.findZone([5.5, 5.5])).toEqual({ sigla: 'M' });
    expect(multi.findZone([3, 3])).toBeNull();
    multi.close();
  });
});
