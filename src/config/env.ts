/**
 * Environment variable overrides for configuration.
 *
 * Provides support for EXPAIR_* environment variables to override
 * configuration values at runtime. Environment variables take precedence
 * over config file values, which take precedence over defaults.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { isProofOptimizationMethod, PROOF_OPTIMIZATION_METHODS } from '../exponent-pair/types.js';
import type { ProverConfig, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * A supported environment variable: its documentation and how it writes
 * into the partial configuration.
 */
interface EnvVarMapping {
  description: string;
  type: 'number' | 'boolean' | 'method';
  apply: (overrides: PartialConfig, value: string, envVar: string) => void;
}

function precision(overrides: PartialConfig, value: string, envVar: string): void {
  overrides.numeric = { ...overrides.numeric, precision: coerceToNumber(value, envVar) };
}

function searchDepth(overrides: PartialConfig, value: string, envVar: string): void {
  overrides.closure = { ...overrides.closure, search_depth: coerceToNumber(value, envVar) };
}

function prune(overrides: PartialConfig, value: string, envVar: string): void {
  overrides.closure = { ...overrides.closure, prune: coerceToBoolean(value, envVar) };
}

function method(overrides: PartialConfig, value: string, envVar: string): void {
  const trimmed = value.trim().toLowerCase();
  if (!isProofOptimizationMethod(trimmed)) {
    throw new EnvCoercionError(
      envVar,
      value,
      'proof method',
      `Cannot coerce '${envVar}' value '${value}' to proof method. Expected one of: ${PROOF_OPTIMIZATION_METHODS.join(', ')}`
    );
  }
  overrides.proof = { ...overrides.proof, method: trimmed };
}

function debug(overrides: PartialConfig, value: string, envVar: string): void {
  overrides.logging = { ...overrides.logging, debug: coerceToBoolean(value, envVar) };
}

/**
 * Mapping from environment variable names to config fields.
 *
 * Format: EXPAIR_<SECTION>_<FIELD> maps to config.<section>.<field>.
 * EXPAIR_DEPTH and EXPAIR_DEBUG are shortcuts. Shortcuts are listed first so
 * that the full name wins when both are set.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvVarMapping>> = {
  EXPAIR_DEPTH: {
    description: 'Override the closure search depth (shortcut for EXPAIR_CLOSURE_SEARCH_DEPTH)',
    type: 'number',
    apply: searchDepth,
  },
  EXPAIR_NUMERIC_PRECISION: {
    description: 'Override the decimal precision used to rationalize floats',
    type: 'number',
    apply: precision,
  },
  EXPAIR_CLOSURE_SEARCH_DEPTH: {
    description: 'Override the number of transform rounds',
    type: 'number',
    apply: searchDepth,
  },
  EXPAIR_CLOSURE_PRUNE: {
    description: 'Enable or disable pruning to hull vertices between rounds (true/false)',
    type: 'boolean',
    apply: prune,
  },
  EXPAIR_PROOF_METHOD: {
    description: 'Override the proof optimization method (date, complexity, none)',
    type: 'method',
    apply: method,
  },
  EXPAIR_DEBUG: {
    description: 'Enable or disable debug logging (true/false)',
    type: 'boolean',
    apply: debug,
  },
};

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Scans for EXPAIR_* environment variables and returns a partial
 * configuration object with the values to override. Empty values are ignored.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Result containing overrides and any errors.
 * @throws EnvCoercionError on the first bad value unless `collectErrors` is set.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ EXPAIR_DEPTH: '3' });
 * result.overrides; // { closure: { search_depth: 3 } }
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
export function mergeConfig(base: ProverConfig, partial: PartialConfig): ProverConfig {
  return {
    numeric: { ...base.numeric, ...partial.numeric },
    closure: { ...base.closure, ...partial.closure },
    proof: { ...base.proof, ...partial.proof },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(
  config: ProverConfig,
  env: EnvRecord = process.env
): ProverConfig {
  const { overrides } = readEnvOverrides(env);

  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
