/**
 * Constructors for exponent-pair hypotheses.
 *
 * @packageDocumentation
 */

import type { RationalLike } from '../numeric/index.js';
import { Hypothesis } from '../knowledge/hypothesis.js';
import { formatYear, Reference } from '../knowledge/reference.js';
import { ExponentPair } from './types.js';

/**
 * An exponent pair taken from the literature.
 */
export function literatureExpPair(
  k: RationalLike,
  l: RationalLike,
  reference: Reference
): Hypothesis<'Exponent pair'> {
  return new Hypothesis({
    name: `${reference.author()} exponent pair`,
    type: 'Exponent pair',
    data: new ExponentPair(k, l),
    proof: `See [${reference.author()}, ${formatYear(reference.year())}]`,
    reference,
  });
}

/**
 * An exponent pair derived from other hypotheses. Its reference is dated by the
 * latest of its dependencies.
 *
 * @param k - First coordinate.
 * @param l - Second coordinate.
 * @param proof - Proof narrative.
 * @param dependencies - Hypotheses the derivation uses.
 */
export function derivedExpPair(
  k: RationalLike,
  l: RationalLike,
  proof: string,
  dependencies: Iterable<Hypothesis>
): Hypothesis<'Exponent pair'> {
  const deps = [...dependencies];
  const data = new ExponentPair(k, l);
  return new Hypothesis({
    name: `Derived exponent pair ${data.toString()}`,
    type: 'Exponent pair',
    data,
    proof,
    reference: Reference.derived(Reference.maxYear(deps.map((d) => d.reference))),
    dependencies: deps,
  });
}

/**
 * The trivial exponent pair (0, 1).
 */
export const trivialExpPair: Hypothesis<'Exponent pair'> = new Hypothesis({
  name: 'Trivial exponent pair (0, 1)',
  type: 'Exponent pair',
  data: new ExponentPair(0, 1),
  proof: 'Triangle inequality',
  reference: Reference.trivial(),
});

/**
 * The exponent pair conjecture: (0, 0) is an exponent pair.
 */
export const exponentPairConjecture: Hypothesis<'Exponent pair'> = new Hypothesis({
  name: 'Exponent pair conjecture',
  type: 'Exponent pair',
  data: new ExponentPair(0, 0),
  proof: 'Conjecture',
  reference: Reference.conjectured(),
});
