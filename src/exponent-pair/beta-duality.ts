/**
 * Exponent pairs from bounds on beta.
 *
 * An upper bound beta(alpha) <= m * alpha + c holding on all of [0, 1/2]
 * corresponds to the exponent pair (k, l) = (c, m + c). Each upper edge of the
 * convex hull of a piecewise bound is such a tangent line, so every edge
 * yields a pair.
 *
 * @packageDocumentation
 */

import { Rational } from '../numeric/index.js';
import { convexHullIndices, samePoint } from '../geometry/index.js';
import type { Point } from '../geometry/index.js';
import type { Hypothesis } from '../knowledge/hypothesis.js';
import type { HypothesisSet } from '../knowledge/hypothesis-set.js';
import { KeyedMap } from '../utils/keyed-map.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { derivedExpPair } from './constructors.js';
import { assertHypothesisSet } from './errors.js';
import { B_TRANSFORM_KEYWORD } from './transforms.js';
import { ExponentPair } from './types.js';

const ALPHA_MAX = Rational.HALF;

/**
 * A supporting line beta = slope * alpha + intercept through a hull edge.
 */
export interface TangentLine {
  readonly slope: Rational;
  readonly intercept: Rational;
}

/**
 * The tangent line through two points with different alpha coordinates.
 */
export function tangentLine(p1: Point, p2: Point): TangentLine {
  const run = p2.x.sub(p1.x);
  return {
    slope: p2.y.sub(p1.y).div(run),
    intercept: p1.y.mul(p2.x).sub(p1.x.mul(p2.y)).div(run),
  };
}

/**
 * The exponent pair dual to a tangent line: (c, m + c).
 */
export function dualExponentPair(line: TangentLine): ExponentPair {
  return new ExponentPair(line.intercept, line.slope.add(line.intercept));
}

/**
 * Edges on beta = 0, alpha = 0 or alpha = 1/2 come from the anchor points and
 * carry no information. The vertical test also covers bounds extending past
 * [0, 1/2], whose outer edges have no finite slope.
 */
function isDegenerateEdge(p1: Point, p2: Point): boolean {
  return (p1.y.isZero() && p2.y.isZero()) || p1.x.equals(p2.x);
}

/**
 * Converts the beta bounds of a set into exponent pairs.
 *
 * Returns `[]` when the set has no beta bounds or they do not cover [0, 1/2].
 * Otherwise returns every exponent pair known to the set (reused as is), the
 * new pairs dual to the hull edges of the bound, and, when the van der Corput B
 * transform is registered, the B images of the dual pairs. Each key appears once.
 *
 * Every new pair depends on all bounds with a boundary point at a hull vertex,
 * not only on the bounds adjacent to its own edge.
 *
 * @param hypotheses - The set. Not modified.
 * @param options - Optional logger.
 * @throws ContractViolationError for a non-set argument.
 */
export function betaBoundsToExponentPairs(
  hypotheses: HypothesisSet,
  options: { logger?: Logger | undefined } = {}
): Hypothesis<'Exponent pair'>[] {
  assertHypothesisSet(hypotheses, 'betaBoundsToExponentPairs');
  const logger = options.logger ?? silentLogger;

  const bounds = hypotheses
    .listHypotheses('Upper bound on beta')
    .sort(
      (a, b) =>
        a.data.domain.x0.compare(b.data.domain.x0) || a.data.domain.x1.compare(b.data.domain.x1)
    );

  // Pieces may overlap, so the sort order does not give the rightmost end.
  const first = bounds[0];
  const rightEnd = bounds.reduce<Rational | undefined>((end, bound) => {
    const { x1 } = bound.data.domain;
    return end === undefined ? x1 : Rational.max(end, x1);
  }, undefined);
  if (
    first === undefined ||
    rightEnd === undefined ||
    first.data.domain.x0.sign() > 0 ||
    rightEnd.compare(ALPHA_MAX) < 0
  ) {
    logger.debug('beta_bounds_insufficient', { boundCount: bounds.length });
    return [];
  }

  const boundaryPoints = (bound: Hypothesis<'Upper bound on beta'>): Point[] => {
    const { domain } = bound.data;
    return [
      { x: domain.x0, y: bound.data.at(domain.x0, true) },
      { x: domain.x1, y: bound.data.at(domain.x1, true) },
    ];
  };

  const points: Point[] = [
    { x: Rational.ZERO, y: Rational.ZERO },
    { x: ALPHA_MAX, y: Rational.ZERO },
    ...bounds.flatMap(boundaryPoints),
  ];

  const vertices: Point[] = [];
  for (const index of convexHullIndices(points, (p) => p)) {
    const vertex = points[index];
    if (vertex !== undefined) {
      vertices.push(vertex);
    }
  }

  const dependencies = bounds.filter((bound) =>
    boundaryPoints(bound).some((p) => vertices.some((v) => samePoint(p, v)))
  );
  const proof = `Follows from combining ${String(dependencies.length)} bounds on \\beta`;

  const pairs = KeyedMap.fromValues(
    hypotheses.listHypotheses('Exponent pair'),
    (h) => h.data,
    (pair: ExponentPair) => pair.key()
  );
  const knownCount = pairs.size;
  const bTransform = hypotheses.findHypothesisOfType(
    B_TRANSFORM_KEYWORD,
    'Exponent pair transform'
  );

  for (let i = 0; i < vertices.length; i++) {
    const p1 = vertices[i];
    const p2 = vertices[(i + 1) % vertices.length];
    if (p1 === undefined || p2 === undefined || isDegenerateEdge(p1, p2)) {
      continue;
    }

    const pair = dualExponentPair(tangentLine(p1, p2));
    let hypothesis = pairs.get(pair);
    if (hypothesis === undefined) {
      hypothesis = derivedExpPair(pair.k, pair.l, proof, dependencies);
      pairs.set(pair, hypothesis);
    }

    if (bTransform !== undefined) {
      const mirror = bTransform.data.transform(hypothesis);
      pairs.setIfAbsent(mirror.data, mirror);
    }
  }

  logger.debug('beta_bounds_converted', {
    boundCount: bounds.length,
    dependencyCount: dependencies.length,
    newPairCount: pairs.size - knownCount,
    mirrored: bTransform !== undefined,
  });

  return pairs.values();
}
