/**
 * Configuration types for expair.toml parsing.
 *
 * @packageDocumentation
 */

import type { ProofOptimizationMethod } from '../exponent-pair/types.js';

/**
 * Numeric precision settings.
 */
export interface NumericConfig {
  /** Decimal places kept when a float is turned into a rational (default: 30). */
  precision: number;
}

/**
 * Transform closure settings.
 */
export interface ClosureConfig {
  /** Number of transform rounds (default: 5). */
  search_depth: number;
  /** Whether to prune to hull vertices after each round (default: true). */
  prune: boolean;
}

/**
 * Proof search settings.
 */
export interface ProofConfig {
  /** Default optimization method for findBestProof (default: 'date'). */
  method: ProofOptimizationMethod;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Whether debug-level entries are written (default: false). */
  debug: boolean;
}

/**
 * Complete configuration object parsed from expair.toml.
 */
export interface ProverConfig {
  numeric: NumericConfig;
  closure: ClosureConfig;
  proof: ProofConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  numeric?: Partial<NumericConfig>;
  closure?: Partial<ClosureConfig>;
  proof?: Partial<ProofConfig>;
  logging?: Partial<LoggingConfig>;
}
