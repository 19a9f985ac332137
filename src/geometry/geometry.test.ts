import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { Rational } from '../numeric/index.js';
import { convexHull, convexHullIndices, cross, Polytope } from './index.js';
import type { Point } from './index.js';

const pt = (x: string | number, y: string | number): Point => ({
  x: Rational.from(x),
  y: Rational.from(y),
});

const render = (points: readonly Point[]): string[] =>
  points.map((p) => `(${p.x.toString()}, ${p.y.toString()})`);

describe('convexHullIndices', () => {
  it('should return square corners counter-clockwise from the lowest-x vertex', () => {
    const points = [pt(0, 0), pt(1, 0), pt(1, 1), pt(0, 1), pt('1/2', '1/2'), pt('1/2', 0)];

    expect(convexHullIndices(points, (p) => p)).toEqual([0, 1, 2, 3]);
  });

  it('should drop collinear points on the boundary', () => {
    const points = [pt(0, 0), pt(2, 0), pt(1, 0), pt(0, 2)];

    expect(render(convexHull(points, (p) => p))).toEqual(['(0, 0)', '(2, 0)', '(0, 2)']);
  });

  it('should reduce collinear input to its extreme points', () => {
    const points = [pt(1, 1), pt(0, 0), pt(2, 2), pt('1/2', '1/2')];

    expect(render(convexHull(points, (p) => p))).toEqual(['(0, 0)', '(2, 2)']);
  });

  it('should keep the first of repeated points', () => {
    const points = [pt(0, 1), pt(0, 1)];

    expect(convexHullIndices(points, (p) => p)).toEqual([0]);
  });

  it('should handle an empty list', () => {
    expect(convexHullIndices([], (p: Point) => p)).toEqual([]);
  });
});

describe('cross', () => {
  it('should be positive for a counter-clockwise turn', () => {
    expect(cross(pt(0, 0), pt(1, 0), pt(0, 1)).toString()).toBe('1');
    expect(cross(pt(0, 0), pt(0, 1), pt(1, 0)).toString()).toBe('-1');
    expect(cross(pt(0, 0), pt(1, 1), pt(2, 2)).isZero()).toBe(true);
  });
});

describe('Polytope', () => {
  const triangle = Polytope.fromVertices([pt(0, 0), pt(1, 0), pt(0, 1)]);

  it('should contain interior points', () => {
    expect(triangle.contains(pt('1/4', '1/4'))).toBe(true);
  });

  it('should contain boundary points and vertices', () => {
    expect(triangle.contains(pt('1/2', '1/2'))).toBe(true);
    expect(triangle.contains(pt(0, 1))).toBe(true);
  });

  it('should reject exterior points', () => {
    expect(triangle.contains(pt('1/2', '501/1000'))).toBe(false);
    expect(triangle.contains(pt(-1, 0))).toBe(false);
  });

  it('should treat a single vertex as a point', () => {
    const point = Polytope.fromVertices([pt(0, 1)]);

    expect(point.contains(pt(0, 1))).toBe(true);
    expect(point.contains(pt('1/2', '1/2'))).toBe(false);
  });

  it('should treat collinear vertices as a closed segment', () => {
    const segment = Polytope.fromVertices([pt(0, 1), pt('1/2', '1/2')]);

    expect(segment.contains(pt('1/4', '3/4'))).toBe(true);
    expect(segment.contains(pt('1/2', '1/2'))).toBe(true);
    expect(segment.contains(pt(1, 0))).toBe(false);
    expect(segment.contains(pt('1/4', '1/2'))).toBe(false);
  });

  it('should contain nothing when empty', () => {
    expect(Polytope.fromVertices([]).contains(pt(0, 0))).toBe(false);
  });

  it('should iterate edges cyclically', () => {
    const edges = [...triangle.edges()].map(([a, b]) => render([a, b]).join(' -> '));

    expect(edges).toEqual(['(0, 0) -> (1, 0)', '(1, 0) -> (0, 1)', '(0, 1) -> (0, 0)']);
  });

  describe('property-based tests', () => {
    const pointArb = fc
      .tuple(fc.integer({ min: -20, max: 20 }), fc.integer({ min: -20, max: 20 }))
      .map(([x, y]) => pt(x, y));

    it('should contain every point it was built from', () => {
      fc.assert(
        fc.property(fc.array(pointArb, { minLength: 1, maxLength: 25 }), (points) => {
          const polytope = Polytope.fromVertices(points);
          return points.every((p) => polytope.contains(p));
        }),
        { numRuns: 200 }
      );
    });

    it('should have no three consecutive collinear vertices', () => {
      fc.assert(
        fc.property(fc.array(pointArb, { minLength: 3, maxLength: 25 }), (points) => {
          const vertices = convexHull(points, (p) => p);
          if (vertices.length < 3) {
            return true;
          }
          return vertices.every((v, i) => {
            const next = vertices[(i + 1) % vertices.length];
            const after = vertices[(i + 2) % vertices.length];
            return next !== undefined && after !== undefined && cross(v, next, after).sign() > 0;
          });
        }),
        { numRuns: 200 }
      );
    });
  });
});
