/**
 * Exact planar convex hull.
 *
 * Coordinates are rationals, so orientation tests are exact and no tolerance is
 * involved: a point is a vertex only when it is a strict corner of the hull.
 *
 * @packageDocumentation
 */

import type { Rational } from '../numeric/index.js';

/**
 * A point in the plane with exact coordinates.
 */
export interface Point {
  readonly x: Rational;
  readonly y: Rational;
}

/**
 * Cross product of (b - a) and (c - a).
 *
 * Positive for a counter-clockwise turn, negative for clockwise, zero when the
 * three points are collinear.
 */
export function cross(a: Point, b: Point, c: Point): Rational {
  return b.x.sub(a.x).mul(c.y.sub(a.y)).sub(b.y.sub(a.y).mul(c.x.sub(a.x)));
}

/**
 * Returns true when two points have identical coordinates.
 */
export function samePoint(a: Point, b: Point): boolean {
  return a.x.equals(b.x) && a.y.equals(b.y);
}

/**
 * Computes the convex hull of a list of items using Andrew's monotone chain.
 *
 * Returns indices into `items`, ordered counter-clockwise starting from the
 * lowest-x (then lowest-y) vertex. Collinear boundary points and repeated
 * coordinates are not vertices; for repeated coordinates the first index wins.
 * When all points are collinear the result is the two extreme points, and a
 * single distinct point yields one index.
 *
 * @param items - Items to wrap.
 * @param pointOf - Extracts the coordinates of an item.
 * @returns Vertex indices in counter-clockwise order.
 */
export function convexHullIndices<T>(items: readonly T[], pointOf: (item: T) => Point): number[] {
  const points = items.map(pointOf);
  const order = points
    .map((_, index) => index)
    .sort((i, j) => {
      const a = points[i];
      const b = points[j];
      if (a === undefined || b === undefined) {
        return 0;
      }
      return a.x.compare(b.x) || a.y.compare(b.y) || i - j;
    });

  const unique: number[] = [];
  for (const index of order) {
    const last = unique[unique.length - 1];
    const p = points[index];
    if (p === undefined) {
      continue;
    }
    const lastPoint = last === undefined ? undefined : points[last];
    if (lastPoint === undefined || !samePoint(lastPoint, p)) {
      unique.push(index);
    }
  }

  if (unique.length <= 2) {
    return unique;
  }

  const at = (index: number): Point => {
    const p = points[index];
    if (p === undefined) {
      throw new RangeError(`No point at index ${String(index)}`);
    }
    return p;
  };

  const buildChain = (sequence: readonly number[]): number[] => {
    const chain: number[] = [];
    for (const index of sequence) {
      while (chain.length >= 2) {
        const a = chain[chain.length - 2];
        const b = chain[chain.length - 1];
        if (a === undefined || b === undefined || cross(at(a), at(b), at(index)).sign() > 0) {
          break;
        }
        chain.pop();
      }
      chain.push(index);
    }
    return chain;
  };

  const lower = buildChain(unique);
  const upper = buildChain([...unique].reverse());

  return [...lower.slice(0, -1), ...upper.slice(0, -1)];
}

/**
 * Computes the convex hull of a list of items, returning the vertex items.
 *
 * @see {@link convexHullIndices}
 */
export function convexHull<T>(items: readonly T[], pointOf: (item: T) => Point): T[] {
  const vertices: T[] = [];
  for (const index of convexHullIndices(items, pointOf)) {
    const item = items[index];
    if (item !== undefined) {
      vertices.push(item);
    }
  }
  return vertices;
}
