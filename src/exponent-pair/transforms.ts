/**
 * Exponent pair transforms.
 *
 * A transform is registered by adding its hypothesis to a HypothesisSet; the
 * closure engine applies every registered transform, so new ones need no engine
 * change.
 *
 * @packageDocumentation
 */

import { Rational } from '../numeric/index.js';
import { Hypothesis } from '../knowledge/hypothesis.js';
import { Reference } from '../knowledge/reference.js';
import { derivedExpPair } from './constructors.js';
import { ExponentPair, ExponentPairTransform } from './types.js';

/**
 * Keyword identifying the van der Corput B transform in a hypothesis set.
 */
export const B_TRANSFORM_KEYWORD = 'van der Corput B transform';

/**
 * Description of a transform to register.
 */
export interface TransformDefinition {
  /** Hypothesis name; used for keyword lookup. */
  name: string;
  /** Short transform name, e.g. "A". */
  label: string;
  /** Where the transform comes from. */
  reference: Reference;
  /** Proof narrative of the transform itself. */
  proof?: string | undefined;
  /** The map on pairs. Must be deterministic. */
  map: (pair: ExponentPair) => ExponentPair;
}

/**
 * Builds a transform hypothesis. Each application yields a derived pair whose
 * dependencies are the input pair and the transform hypothesis.
 */
export function defineTransform(
  definition: TransformDefinition
): Hypothesis<'Exponent pair transform'> {
  const hypothesis: Hypothesis<'Exponent pair transform'> = new Hypothesis({
    name: definition.name,
    type: 'Exponent pair transform',
    data: new ExponentPairTransform(definition.label, (source) => {
      const image = definition.map(source.data);
      return derivedExpPair(
        image.k,
        image.l,
        `Follows from applying the ${definition.label} transform to ${source.data.toString()}`,
        [source, hypothesis]
      );
    }),
    proof: definition.proof ?? `See ${definition.reference.toString()}`,
    reference: definition.reference,
  });
  return hypothesis;
}

/**
 * van der Corput A process: (k, l) -> (k / (2k + 2), 1/2 + l / (2k + 2)).
 */
export function vanDerCorputAMap(pair: ExponentPair): ExponentPair {
  const denominator = pair.k.mul(2).add(2);
  return new ExponentPair(pair.k.div(denominator), Rational.HALF.add(pair.l.div(denominator)));
}

/**
 * van der Corput B process: (k, l) -> (l - 1/2, k + 1/2). An involution.
 */
export function vanDerCorputBMap(pair: ExponentPair): ExponentPair {
  return new ExponentPair(pair.l.sub(Rational.HALF), pair.k.add(Rational.HALF));
}

export const vanDerCorputA: Hypothesis<'Exponent pair transform'> = defineTransform({
  name: 'van der Corput A transform',
  label: 'A',
  reference: Reference.literature('van der Corput', 1922),
  map: vanDerCorputAMap,
});

export const vanDerCorputB: Hypothesis<'Exponent pair transform'> = defineTransform({
  name: B_TRANSFORM_KEYWORD,
  label: 'B',
  reference: Reference.literature('van der Corput', 1921),
  map: vanDerCorputBMap,
});
