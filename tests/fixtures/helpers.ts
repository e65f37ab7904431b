import type { ClusterRecord, Point } from '../../src/types.js';

/** Create a Point from coordinate pairs. */
export function makePoints(coords: [number, number][]): Point[] {
  return coords.map(([x, y]) => ({ x, y }));
}

/** Create a ClusterRecord with defaults. */
export function makeRecord(overrides: Partial<ClusterRecord> = {}): ClusterRecord {
  return {
    cluster: 0,
    lat: 45.76,
    long: 4.83,
    similarYear: true,
    url: 'https://example.com/photo',
    tags: [],
    ...overrides,
  };
}

/** Records at the corners of a square plus its centre, all in one cluster. */
export function makeSquareCluster(
  cluster: number,
  long: number,
  lat: number,
  size: number = 0.01,
  tags: string[] = [],
): ClusterRecord[] {
  const corners: [number, number][] = [
    [long, lat],
    [long + size, lat],
    [long + size, lat + size],
    [long, lat + size],
    [long + size / 2, lat + size / 2],
  ];
  return corners.map(([x, y]) => makeRecord({ cluster, long: x, lat: y, tags }));
}

/** Twice the signed area: positive for counter-clockwise vertex order. */
export function signedArea2(polygon: Point[]): number {
  let area = 0;
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    area += polygon[j].x * polygon[i].y - polygon[i].x * polygon[j].y;
  }
  return area;
}
