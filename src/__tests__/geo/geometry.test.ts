import { createGeometry, parseGeometry, pointSegmentDistance } from '../../geo/geometry';
import type { GeometryHandle } from '../../geo/geometry';

const square = {
  type: 'Polygon',
  coordinates: [
    [
      [0, 0],
      [10, 0],
      [10, 10],
      [0, 10],
      [0, 0],
    ],
  ],
};

function handleOf(raw: unknown): GeometryHandle {
  const result = createGeometry(raw);
  if (result.status !== 'success') {
    throw new Error(`expected a valid geometry, got: ${result.error}`);
  }
  return result.geometry;
}

describe('parseGeometry', () => {
  test('should reject missing geometries', () => {
    expect(parseGeometry(null)).toEqual({ status: 'failure', error: 'Geometry is missing or not an object' });
    expect(parseGeometry(undefined).status).toBe('failure');
  });

  test('should reject unsupported geometry types', () => {
    expect(parseGeometry({ type: 'Point', coordinates: [0, 0] })).toEqual({
      status: 'failure',
      error: 'Unsupported geometry type: Point',
    });
  });

  test('should reject unclosed polygon rings', () => {
    const open = { type: 'Polygon', coordinates: [[[0, 0], [10, 0], [10, 10], [0, 10]]] };
    expect(parseGeometry(open).status).toBe('failure');
  });

  test('should reject non-finite coordinates', () => {
    const line = { type: 'LineString', coordinates: [[0, 0], [Number.NaN, 1]] };
    expect(parseGeometry(line).status).toBe('failure');
  });

  test('should reject a line with a single position', () => {
    expect(parseGeometry({ type: 'LineString', coordinates: [[0, 0]] }).status).toBe('failure');
  });

  test('should reject a multipolygon holding one bad polygon', () => {
    const multi = {
      type: 'MultiPolygon',
      coordinates: [square.coordinates, [[[0, 0], [1, 0], [0, 0]]]],
    };
    expect(parseGeometry(multi).status).toBe('failure');
  });

  test('should accept the four supported types', () => {
    expect(parseGeometry(square).status).toBe('success');
    expect(parseGeometry({ type: 'MultiPolygon', coordinates: [square.coordinates] }).status).toBe('success');
    expect(parseGeometry({ type: 'LineString', coordinates: [[0, 0], [1, 1]] }).status).toBe('success');
    expect(parseGeometry({ type: 'MultiLineString', coordinates: [[[0, 0], [1, 1]]] }).status).toBe('success');
  });
});

describe('area handles', () => {
  const polygon = handleOf(square);

  test('should expose kind and bbox', () => {
    expect(polygon.kind).toBe('area');
    expect(polygon.bbox).toEqual([0, 0, 10, 10]);
  });

  test('should contain interior points only', () => {
    expect(polygon.contains([5, 5])).toBe(true);
    expect(polygon.contains([0, 5])).toBe(false);
    expect(polygon.contains([11, 5])).toBe(false);
  });

  test('should intersect boundary points', () => {
    expect(polygon.intersects([0, 5])).toBe(true);
    expect(polygon.intersects([10, 10])).toBe(true);
    expect(polygon.intersects([11, 5])).toBe(false);
  });

  test('should measure distance to the nearest edge', () => {
    expect(polygon.distance([5, 5])).toBe(0);
    expect(polygon.distance([13, 14])).toBeCloseTo(5, 10);
    expect(polygon.distance([5, -2])).toBeCloseTo(2, 10);
  });

  test('should leave holes out of the polygon', () => {
    const withHole = handleOf({
      type: 'Polygon',
      coordinates: [
        square.coordinates[0],
        [
          [4, 4],
          [6, 4],
          [6, 6],
          [4, 6],
          [4, 4],
        ],
      ],
    });
    expect(withHole.contains([5, 5])).toBe(false);
    expect(withHole.contains([2, 2])).toBe(true);
    expect(withHole.distance([5, 5])).toBeCloseTo(1, 10);
  });
});

describe('line handles', () => {
  const line = handleOf({ type: 'LineString', coordinates: [[0, 0], [10, 0]] });

  test('should never contain a point', () => {
    expect(line.kind).toBe('line');
    expect(line.contains([5, 0])).toBe(false);
  });

  test('should intersect points lying on the line', () => {
    expect(line.intersects([5, 0])).toBe(true);
    expect(line.intersects([5, 1])).toBe(false);
  });

  test('should measure perpendicular and end-point distances', () => {
    expect(line.distance([5, 3])).toBeCloseTo(3, 10);
    expect(line.distance([-3, 4])).toBeCloseTo(5, 10);
    expect(line.distance([5, 0])).toBe(0);
  });

  test('should use the closest part of a multilinestring', () => {
    const multi = handleOf({
      type: 'MultiLineString',
      coordinates: [
        [[0, 0], [10, 0]],
        [[0, 8], [10, 8]],
      ],
    });
    expect(multi.distance([5, 7])).toBeCloseTo(1, 10);
    expect(multi.intersects([5, 8])).toBe(true);
    expect(multi.bbox).toEqual([0, 0, 10, 8]);
  });
});

describe('pointSegmentDistance', () => {
  test('should handle degenerate segments', () => {
    expect(pointSegmentDistance([3, 4], [0, 0], [0, 0])).toBe(5);
  });
});
