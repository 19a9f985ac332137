/**
 * Exact rational arithmetic over bigint.
 *
 * Every exponent pair, hull vertex and beta-bound value in the engine is a
 * {@link Rational}, so deduplication and degeneracy checks compare exact values.
 *
 * @packageDocumentation
 */

import type { NumericContext } from './context.js';

/**
 * Error class for invalid rational construction or arithmetic.
 */
export class RationalArithmeticError extends Error {
  /**
   * Creates a new RationalArithmeticError.
   *
   * @param message - Descriptive error message.
   */
  constructor(message: string) {
    super(message);
    this.name = 'RationalArithmeticError';
  }
}

/**
 * Values accepted wherever a rational is expected.
 *
 * Numbers must be integers; strings may be integers, fractions (`"3/7"`) or
 * finite decimals (`"0.125"`).
 */
export type RationalLike = Rational | bigint | number | string;

const FRACTION_PATTERN = /^\s*([+-]?\d+)\s*\/\s*([+-]?\d+)\s*$/;
const DECIMAL_PATTERN = /^\s*([+-]?)(\d*)(?:\.(\d*))?\s*$/;

function abs(n: bigint): bigint {
  return n < 0n ? -n : n;
}

function gcd(a: bigint, b: bigint): bigint {
  let x = abs(a);
  let y = abs(b);
  while (y !== 0n) {
    const t = x % y;
    x = y;
    y = t;
  }
  return x;
}

/**
 * Immutable rational number in lowest terms with a positive denominator.
 *
 * @example
 * ```typescript
 * const half = Rational.of(1, 2);
 * half.add(Rational.of(1, 3)).toString(); // "5/6"
 * Rational.from('0.25').equals(Rational.of(1, 4)); // true
 * ```
 */
export class Rational {
  static readonly ZERO = new Rational(0n, 1n);
  static readonly ONE = new Rational(1n, 1n);
  static readonly HALF = new Rational(1n, 2n);

  readonly numerator: bigint;
  readonly denominator: bigint;

  private constructor(numerator: bigint, denominator: bigint) {
    this.numerator = numerator;
    this.denominator = denominator;
  }

  /**
   * Creates a rational from a numerator and denominator, reducing to lowest terms.
   *
   * @throws RationalArithmeticError if the denominator is zero or an argument is
   * not an integer.
   */
  static of(numerator: bigint | number, denominator: bigint | number = 1n): Rational {
    const n = Rational.toBigInt(numerator);
    const d = Rational.toBigInt(denominator);
    if (d === 0n) {
      throw new RationalArithmeticError('Denominator must be non-zero');
    }
    const sign = d < 0n ? -1n : 1n;
    const g = gcd(n, d);
    return new Rational((sign * n) / g, (sign * d) / g);
  }

  /**
   * Coerces a {@link RationalLike} value to a rational.
   *
   * @throws RationalArithmeticError if the value cannot be represented exactly.
   */
  static from(value: RationalLike): Rational {
    if (value instanceof Rational) {
      return value;
    }
    if (typeof value === 'bigint' || typeof value === 'number') {
      return Rational.of(value);
    }
    return Rational.parse(value);
  }

  /**
   * Parses an integer, fraction or finite decimal string.
   *
   * @throws RationalArithmeticError for malformed input.
   */
  static parse(text: string): Rational {
    const fraction = FRACTION_PATTERN.exec(text);
    if (fraction !== null) {
      const [, n, d] = fraction;
      if (n !== undefined && d !== undefined) {
        return Rational.of(BigInt(n), BigInt(d));
      }
    }

    const decimal = DECIMAL_PATTERN.exec(text);
    if (decimal !== null) {
      const [, sign = '', whole = '', fractional = ''] = decimal;
      if (whole !== '' || fractional !== '') {
        const digits = BigInt(`${sign}${whole === '' ? '0' : whole}${fractional}`);
        return Rational.of(digits, 10n ** BigInt(fractional.length));
      }
    }

    throw new RationalArithmeticError(`Cannot parse '${text}' as a rational`);
  }

  /**
   * Approximates a finite float by the continued-fraction convergent with the
   * largest denominator allowed by the numeric context.
   *
   * @throws RationalArithmeticError if the value is NaN or infinite.
   */
  static fromNumber(value: number, context: NumericContext): Rational {
    if (!Number.isFinite(value)) {
      throw new RationalArithmeticError(`Cannot approximate non-finite value ${String(value)}`);
    }
    if (Number.isInteger(value)) {
      return Rational.of(BigInt(value));
    }

    const negative = value < 0;
    let x = Math.abs(value);
    let [h0, h1] = [0n, 1n];
    let [k0, k1] = [1n, 0n];

    for (;;) {
      const a = Math.floor(x);
      const ab = BigInt(a);
      const h2 = ab * h1 + h0;
      const k2 = ab * k1 + k0;
      if (k2 > context.maxDenominator) {
        break;
      }
      [h0, h1] = [h1, h2];
      [k0, k1] = [k1, k2];
      const remainder = x - a;
      if (remainder === 0 || Number(h1) / Number(k1) === Math.abs(value)) {
        break;
      }
      x = 1 / remainder;
      if (!Number.isFinite(x)) {
        break;
      }
    }

    return Rational.of(negative ? -h1 : h1, k1);
  }

  /**
   * Like {@link Rational.from}, but approximates non-integer numbers through the
   * numeric context instead of rejecting them.
   */
  static coerce(value: RationalLike, context: NumericContext): Rational {
    if (typeof value === 'number' && !Number.isInteger(value)) {
      return Rational.fromNumber(value, context);
    }
    return Rational.from(value);
  }

  /** Returns the smaller of two rationals, preferring the first on ties. */
  static min(a: Rational, b: Rational): Rational {
    return b.compare(a) < 0 ? b : a;
  }

  /** Returns the larger of two rationals, preferring the first on ties. */
  static max(a: Rational, b: Rational): Rational {
    return b.compare(a) > 0 ? b : a;
  }

  private static toBigInt(value: bigint | number): bigint {
    if (typeof value === 'bigint') {
      return value;
    }
    if (!Number.isSafeInteger(value)) {
      throw new RationalArithmeticError(
        `Expected a safe integer, got ${String(value)}; use Rational.fromNumber for floats`
      );
    }
    return BigInt(value);
  }

  add(other: RationalLike): Rational {
    const o = Rational.from(other);
    return Rational.of(
      this.numerator * o.denominator + o.numerator * this.denominator,
      this.denominator * o.denominator
    );
  }

  sub(other: RationalLike): Rational {
    const o = Rational.from(other);
    return Rational.of(
      this.numerator * o.denominator - o.numerator * this.denominator,
      this.denominator * o.denominator
    );
  }

  mul(other: RationalLike): Rational {
    const o = Rational.from(other);
    return Rational.of(this.numerator * o.numerator, this.denominator * o.denominator);
  }

  /**
   * @throws RationalArithmeticError on division by zero.
   */
  div(other: RationalLike): Rational {
    const o = Rational.from(other);
    if (o.numerator === 0n) {
      throw new RationalArithmeticError(`Division of ${this.toString()} by zero`);
    }
    return Rational.of(this.numerator * o.denominator, this.denominator * o.numerator);
  }

  /** Returns -1, 0 or 1. */
  compare(other: RationalLike): number {
    const o = Rational.from(other);
    const lhs = this.numerator * o.denominator;
    const rhs = o.numerator * this.denominator;
    if (lhs < rhs) {
      return -1;
    }
    return lhs > rhs ? 1 : 0;
  }

  equals(other: RationalLike): boolean {
    const o = Rational.from(other);
    return this.numerator === o.numerator && this.denominator === o.denominator;
  }

  sign(): number {
    if (this.numerator === 0n) {
      return 0;
    }
    return this.numerator < 0n ? -1 : 1;
  }

  isZero(): boolean {
    return this.numerator === 0n;
  }

  toNumber(): number {
    return Number(this.numerator) / Number(this.denominator);
  }

  /**
   * Canonical key. Two rationals share a key exactly when they are equal.
   */
  key(): string {
    return this.toString();
  }

  toString(): string {
    return this.denominator === 1n
      ? this.numerator.toString()
      : `${this.numerator.toString()}/${this.denominator.toString()}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
