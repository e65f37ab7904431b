import type { Point } from '../types.js';

/** Twice the signed area of triangle o-a-b. Positive when o → a → b turns left. */
function turn(o: Point, a: Point, b: Point): number {
  return (a.x - o.x) * (b.y - o.y) - (a.y - o.y) * (b.x - o.x);
}

/** Lexicographic (x, then y) order with exact duplicates collapsed. */
function sortedDistinct<T extends Point>(points: readonly T[]): T[] {
  const sorted = [...points].sort((a, b) => a.x - b.x || a.y - b.y);
  return sorted.filter((p, i) => i === 0 || p.x !== sorted[i - 1].x || p.y !== sorted[i - 1].y);
}

/**
 * One side of the hull, walking `ordered` and keeping only strict left turns.
 * Straight runs count as non-turns, so their midpoints are dropped.
 */
function chain<T extends Point>(ordered: readonly T[]): T[] {
  const kept: T[] = [];
  for (const p of ordered) {
    while (kept.length >= 2 && turn(kept[kept.length - 2], kept[kept.length - 1], p) <= 0) {
      kept.pop();
    }
    kept.push(p);
  }
  return kept;
}

/**
 * Convex hull by Andrew's monotone chain.
 *
 * The result is open and counter-clockwise, starting at the lowest-x (then lowest-y)
 * point, and only holds input objects. Under 3 distinct points it is empty; exactly
 * collinear input leaves the two extreme points. Turn tests are exact, with no tolerance.
 */
export function convexHull<T extends Point>(points: readonly T[]): T[] {
  const ordered = sortedDistinct(points);
  if (ordered.length < 3) return [];

  const lower = chain(ordered);
  const upper = chain([...ordered].reverse());

  // Each chain ends where the other one starts
  return [...lower.slice(0, -1), ...upper.slice(0, -1)];
}

/** Repeat the first vertex at the end, for consumers that need a closed ring. */
export function closeRing<T>(hull: readonly T[]): T[] {
  if (hull.length === 0) return [];
  return [...hull, hull[0]];
}
