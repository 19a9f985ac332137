/**
 * Configuration module for expair.toml parsing and validation.
 *
 * Provides typed configuration parsing with defaults, semantic validation,
 * and environment variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  ClosureConfig,
  LoggingConfig,
  NumericConfig,
  PartialConfig,
  ProofConfig,
  ProverConfig,
} from './types.js';
export {
  DEFAULT_CLOSURE,
  DEFAULT_CONFIG,
  DEFAULT_LOGGING,
  DEFAULT_NUMERIC,
  DEFAULT_PROOF,
} from './defaults.js';
export {
  ConfigValidationError,
  validateConfig,
  assertConfigValid,
  PRECISION_RANGE,
  SEARCH_DEPTH_RANGE,
} from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
