/**
 * Piecewise upper bounds on beta(alpha) for alpha in [0, 1/2].
 *
 * A full bound is a list of pieces, each valid on its own interval. The
 * exponent-pair engine only needs to evaluate a piece at the ends of its domain.
 *
 * @packageDocumentation
 */

import { Rational } from '../numeric/index.js';
import type { NumericContext, RationalLike } from '../numeric/index.js';
import { Hypothesis } from '../knowledge/hypothesis.js';
import type { Reference } from '../knowledge/reference.js';

/**
 * Error class for evaluating a piece outside its domain.
 */
export class OutOfDomainError extends Error {
  /** The point that was evaluated. */
  public readonly point: string;
  /** The domain of the piece. */
  public readonly domain: string;

  /**
   * Creates a new OutOfDomainError.
   *
   * @param point - The rejected point.
   * @param domain - The piece's domain.
   */
  constructor(point: Rational, domain: Interval) {
    super(`Point ${point.toString()} lies outside the domain ${domain.toString()}`);
    this.name = 'OutOfDomainError';
    this.point = point.toString();
    this.domain = domain.toString();
  }
}

/**
 * Error class for an interval whose lower end exceeds its upper end.
 */
export class InvalidIntervalError extends Error {
  /**
   * Creates a new InvalidIntervalError.
   *
   * @param x0 - Lower end.
   * @param x1 - Upper end.
   */
  constructor(x0: Rational, x1: Rational) {
    super(`Invalid interval: lower end ${x0.toString()} exceeds upper end ${x1.toString()}`);
    this.name = 'InvalidIntervalError';
  }
}

/**
 * An interval of the real line with optionally open ends.
 */
export class Interval {
  readonly x0: Rational;
  readonly x1: Rational;
  readonly includeLower: boolean;
  readonly includeUpper: boolean;

  constructor(x0: RationalLike, x1: RationalLike, includeLower = true, includeUpper = true) {
    this.x0 = Rational.from(x0);
    this.x1 = Rational.from(x1);
    if (this.x0.compare(this.x1) > 0) {
      throw new InvalidIntervalError(this.x0, this.x1);
    }
    this.includeLower = includeLower;
    this.includeUpper = includeUpper;
  }

  /**
   * Tests membership, respecting open ends.
   */
  contains(x: Rational): boolean {
    const lower = x.compare(this.x0);
    const upper = x.compare(this.x1);
    return (
      (lower > 0 || (lower === 0 && this.includeLower)) &&
      (upper < 0 || (upper === 0 && this.includeUpper))
    );
  }

  /**
   * Tests membership in the closed interval [x0, x1].
   */
  closureContains(x: Rational): boolean {
    return x.compare(this.x0) >= 0 && x.compare(this.x1) <= 0;
  }

  toString(): string {
    return `${this.includeLower ? '[' : '('}${this.x0.toString()}, ${this.x1.toString()}${this.includeUpper ? ']' : ')'}`;
  }
}

/**
 * One piece of a piecewise bound on beta.
 */
export interface BetaBoundPiece {
  /** Label used in names and keys. */
  readonly name: string;
  /** Interval on which the bound holds. */
  readonly domain: Interval;
  /**
   * Evaluates the bound.
   *
   * @param alpha - Point of evaluation.
   * @param extendDomain - Also accept the ends of an open domain, by continuity.
   * @throws OutOfDomainError if alpha is outside the (closed, when extending) domain.
   */
  at(alpha: Rational, extendDomain?: boolean): Rational;
  /** Identity of the piece. */
  key(): string;
}

function checkDomain(domain: Interval, alpha: Rational, extendDomain: boolean): void {
  const inside = extendDomain ? domain.closureContains(alpha) : domain.contains(alpha);
  if (!inside) {
    throw new OutOfDomainError(alpha, domain);
  }
}

/**
 * A linear bound beta(alpha) <= m * alpha + c, evaluated exactly.
 */
export class AffinePiece implements BetaBoundPiece {
  readonly name: string;
  readonly domain: Interval;
  readonly slope: Rational;
  readonly intercept: Rational;

  constructor(slope: RationalLike, intercept: RationalLike, domain: Interval, name = 'affine') {
    this.slope = Rational.from(slope);
    this.intercept = Rational.from(intercept);
    this.domain = domain;
    this.name = name;
  }

  at(alpha: Rational, extendDomain = false): Rational {
    checkDomain(this.domain, alpha, extendDomain);
    return this.slope.mul(alpha).add(this.intercept);
  }

  key(): string {
    return `${this.name}:${this.slope.key()}*a+${this.intercept.key()}@${this.domain.toString()}`;
  }
}

/**
 * A bound given by a floating-point function, rationalized at the precision of
 * a numeric context so that downstream comparisons stay exact.
 */
export class SampledPiece implements BetaBoundPiece {
  readonly name: string;
  readonly domain: Interval;
  private readonly fn: (alpha: number) => number;
  private readonly context: NumericContext;

  constructor(
    name: string,
    fn: (alpha: number) => number,
    domain: Interval,
    context: NumericContext
  ) {
    this.name = name;
    this.fn = fn;
    this.domain = domain;
    this.context = context;
  }

  at(alpha: Rational, extendDomain = false): Rational {
    checkDomain(this.domain, alpha, extendDomain);
    return Rational.fromNumber(this.fn(alpha.toNumber()), this.context);
  }

  key(): string {
    return `${this.name}@${this.domain.toString()}`;
  }
}

/**
 * Wraps a piece as a beta-bound hypothesis.
 *
 * @param piece - The bound.
 * @param reference - Where the bound comes from.
 * @param proof - Proof narrative; defaults to a citation of the reference.
 */
export function betaBoundHypothesis(
  piece: BetaBoundPiece,
  reference: Reference,
  proof?: string
): Hypothesis<'Upper bound on beta'> {
  return new Hypothesis({
    name: `${reference.author()} bound on \\beta on ${piece.domain.toString()}`,
    type: 'Upper bound on beta',
    data: piece,
    proof: proof ?? `See ${reference.toString()}`,
    reference,
  });
}
