/**
 * Configured entry point to the exponent-pair engine.
 *
 * @packageDocumentation
 */

import { SampledPiece } from '../beta/bound.js';
import type { Interval } from '../beta/bound.js';
import {
  applyEnvOverrides,
  assertConfigValid,
  getDefaultConfig,
  parseConfig,
} from '../config/index.js';
import type { EnvRecord, ProverConfig } from '../config/index.js';
import type { Hypothesis } from '../knowledge/hypothesis.js';
import type { HypothesisSet } from '../knowledge/hypothesis-set.js';
import { createNumericContext } from '../numeric/index.js';
import type { NumericContext, RationalLike } from '../numeric/index.js';
import { Logger } from '../utils/logger.js';
import { betaBoundsToExponentPairs } from './beta-duality.js';
import { computeExpPairs } from './closure.js';
import { computeConvexHull } from './hull-cache.js';
import { findBestProof, findProof } from './proof-search.js';
import type { ProofOutcome } from './proof-search.js';

/**
 * Options for constructing an {@link ExponentPairProver}.
 */
export interface ProverOptions {
  /**
   * Destination for log lines.
   * @defaultValue process.stderr
   */
  sink?: ((line: string) => void) | undefined;
}

/**
 * Engine operations bound to one configuration.
 *
 * Search depth, pruning and the default proof method come from the config;
 * each subsystem logs under its own component name.
 *
 * @example
 * ```typescript
 * const prover = createProver('[closure]\nsearch_depth = 3');
 * const set = new HypothesisSet([trivialExpPair, vanDerCorputA, vanDerCorputB]);
 * const outcome = prover.findBestProof('1/6', '2/3', set);
 * ```
 */
export class ExponentPairProver {
  readonly config: ProverConfig;
  readonly context: NumericContext;
  private readonly closureLogger: Logger;
  private readonly hullLogger: Logger;
  private readonly dualityLogger: Logger;
  private readonly searchLogger: Logger;

  /**
   * @throws ConfigValidationError if the configuration is out of range.
   */
  constructor(config: ProverConfig = getDefaultConfig(), options: ProverOptions = {}) {
    assertConfigValid(config);
    this.config = config;
    this.context = createNumericContext(config.numeric.precision);

    const root = new Logger({
      component: 'Prover',
      debugMode: config.logging.debug,
      sink: options.sink,
    });
    this.closureLogger = root.child('Closure');
    this.hullLogger = root.child('HullCache');
    this.dualityLogger = root.child('BetaDuality');
    this.searchLogger = root.child('ProofSearch');
  }

  computeExpPairs(hypotheses: HypothesisSet): Hypothesis<'Exponent pair'>[] {
    return computeExpPairs(hypotheses, {
      searchDepth: this.config.closure.search_depth,
      prune: this.config.closure.prune,
      logger: this.closureLogger,
    });
  }

  computeConvexHull(hypotheses: HypothesisSet): readonly Hypothesis<'Exponent pair'>[] {
    return computeConvexHull(hypotheses, { logger: this.hullLogger });
  }

  betaBoundsToExponentPairs(hypotheses: HypothesisSet): Hypothesis<'Exponent pair'>[] {
    return betaBoundsToExponentPairs(hypotheses, { logger: this.dualityLogger });
  }

  findProof(
    k: RationalLike,
    l: RationalLike,
    hypotheses: HypothesisSet,
    optimize = true
  ): Hypothesis<'Exponent pair'> | undefined {
    return findProof(k, l, hypotheses, { ...this.searchOptions(), optimize });
  }

  /**
   * @param method - Defaults to `proof.method` from the config.
   */
  findBestProof(
    k: RationalLike,
    l: RationalLike,
    hypotheses: HypothesisSet,
    method: string = this.config.proof.method
  ): ProofOutcome {
    return findBestProof(k, l, hypotheses, method, this.searchOptions());
  }

  /**
   * A beta bound given by a float function, rationalized at this prover's precision.
   */
  sampledPiece(
    name: string,
    fn: (alpha: number) => number,
    domain: Interval
  ): SampledPiece {
    return new SampledPiece(name, fn, domain, this.context);
  }

  private searchOptions(): {
    searchDepth: number;
    prune: boolean;
    context: NumericContext;
    logger: Logger;
  } {
    return {
      searchDepth: this.config.closure.search_depth,
      prune: this.config.closure.prune,
      context: this.context,
      logger: this.searchLogger,
    };
  }
}

/**
 * Builds a prover from TOML text and the environment.
 *
 * Precedence: env > TOML > defaults.
 *
 * @param tomlContent - Contents of an expair.toml; empty for defaults.
 * @param env - Environment to read EXPAIR_* overrides from.
 * @param options - Prover options.
 * @throws ConfigParseError, EnvCoercionError or ConfigValidationError.
 */
export function createProver(
  tomlContent = '',
  env: EnvRecord = process.env,
  options: ProverOptions = {}
): ExponentPairProver {
  const config = applyEnvOverrides(parseConfig(tomlContent), env);
  return new ExponentPairProver(config, options);
}
