/**
 * Convex polygon built from a vertex list, with boundary-inclusive containment.
 *
 * @packageDocumentation
 */

import { Rational } from '../numeric/index.js';
import { convexHull, cross, samePoint } from './hull.js';
import type { Point } from './hull.js';

/**
 * Convex polytope in the plane.
 *
 * Degenerate inputs are handled: a single point contains only itself, and a
 * collinear vertex list is the closed segment between its extreme points.
 *
 * @example
 * ```typescript
 * const triangle = Polytope.fromVertices([
 *   { x: Rational.ZERO, y: Rational.ZERO },
 *   { x: Rational.ONE, y: Rational.ZERO },
 *   { x: Rational.ZERO, y: Rational.ONE },
 * ]);
 * triangle.contains({ x: Rational.HALF, y: Rational.HALF }); // true (on an edge)
 * ```
 */
export class Polytope {
  /** Hull vertices in counter-clockwise order. */
  readonly vertices: readonly Point[];

  private constructor(vertices: readonly Point[]) {
    this.vertices = vertices;
  }

  /**
   * Builds the polytope spanned by a vertex list. Points inside the hull are
   * ignored.
   */
  static fromVertices(points: readonly Point[]): Polytope {
    return new Polytope(convexHull(points, (p) => p));
  }

  /**
   * Iterates over consecutive vertex pairs, wrapping from the last vertex to the
   * first. Yields nothing for fewer than two vertices.
   */
  *edges(): Generator<[Point, Point]> {
    const n = this.vertices.length;
    if (n < 2) {
      return;
    }
    for (let i = 0; i < n; i++) {
      const a = this.vertices[i];
      const b = this.vertices[(i + 1) % n];
      if (a !== undefined && b !== undefined) {
        yield [a, b];
      }
    }
  }

  /**
   * Tests whether a point lies in the polytope, boundary included.
   */
  contains(point: Point): boolean {
    const [first, second] = this.vertices;
    if (first === undefined) {
      return false;
    }
    if (second === undefined) {
      return samePoint(first, point);
    }
    if (this.vertices.length === 2) {
      return (
        cross(first, second, point).isZero() &&
        point.x.compare(Rational.min(first.x, second.x)) >= 0 &&
        point.x.compare(Rational.max(first.x, second.x)) <= 0 &&
        point.y.compare(Rational.min(first.y, second.y)) >= 0 &&
        point.y.compare(Rational.max(first.y, second.y)) <= 0
      );
    }
    for (const [a, b] of this.edges()) {
      if (cross(a, b, point).sign() < 0) {
        return false;
      }
    }
    return true;
  }
}
