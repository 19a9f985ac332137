/**
 * Exact two-dimensional geometry.
 *
 * @packageDocumentation
 */

export { convexHull, convexHullIndices, cross, samePoint } from './hull.js';
export type { Point } from './hull.js';
export { Polytope } from './polytope.js';
