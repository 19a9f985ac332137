/**
 * Default configuration values for expair.toml.
 *
 * @packageDocumentation
 */

import type {
  ClosureConfig,
  LoggingConfig,
  NumericConfig,
  ProofConfig,
  ProverConfig,
} from './types.js';

export const DEFAULT_NUMERIC: NumericConfig = {
  precision: 30,
};

export const DEFAULT_CLOSURE: ClosureConfig = {
  search_depth: 5,
  prune: true,
};

export const DEFAULT_PROOF: ProofConfig = {
  method: 'date',
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: ProverConfig = {
  numeric: DEFAULT_NUMERIC,
  closure: DEFAULT_CLOSURE,
  proof: DEFAULT_PROOF,
  logging: DEFAULT_LOGGING,
};
