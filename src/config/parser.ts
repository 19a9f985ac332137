/**
 * TOML configuration parser for expair.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { isProofOptimizationMethod, PROOF_OPTIMIZATION_METHODS } from '../exponent-pair/types.js';
import {
  DEFAULT_CLOSURE,
  DEFAULT_CONFIG,
  DEFAULT_LOGGING,
  DEFAULT_NUMERIC,
  DEFAULT_PROOF,
} from './defaults.js';
import type {
  ClosureConfig,
  LoggingConfig,
  NumericConfig,
  ProofConfig,
  ProverConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

type RawSection = Record<string, unknown>;

function isRawSection(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns a TOML table by name, or undefined if absent.
 *
 * @throws ConfigParseError if the entry exists but is not a table.
 */
function section(parsed: RawSection, name: string): RawSection | undefined {
  const value = parsed[name];
  if (value === undefined) {
    return undefined;
  }
  if (!isRawSection(value)) {
    throw new ConfigParseError(`Invalid type for '${name}': expected table, got ${typeof value}`);
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

function parseNumeric(raw: RawSection | undefined): NumericConfig {
  const result: NumericConfig = { ...DEFAULT_NUMERIC };
  if (raw === undefined) {
    return result;
  }

  if ('precision' in raw) {
    result.precision = validateNumber(raw.precision, 'numeric.precision');
  }

  return result;
}

function parseClosure(raw: RawSection | undefined): ClosureConfig {
  const result: ClosureConfig = { ...DEFAULT_CLOSURE };
  if (raw === undefined) {
    return result;
  }

  if ('search_depth' in raw) {
    result.search_depth = validateNumber(raw.search_depth, 'closure.search_depth');
  }
  if ('prune' in raw) {
    result.prune = validateBoolean(raw.prune, 'closure.prune');
  }

  return result;
}

function parseProof(raw: RawSection | undefined): ProofConfig {
  const result: ProofConfig = { ...DEFAULT_PROOF };
  if (raw === undefined) {
    return result;
  }

  if ('method' in raw) {
    const method = validateString(raw.method, 'proof.method');
    if (!isProofOptimizationMethod(method)) {
      throw new ConfigParseError(
        `Invalid value for 'proof.method': expected one of ${PROOF_OPTIMIZATION_METHODS.map((m) => `'${m}'`).join(', ')}, got '${method}'`
      );
    }
    result.method = method;
  }

  return result;
}

function parseLogging(raw: RawSection | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a configuration object.
 *
 * TOML integers arrive as numbers; range checks are left to
 * {@link validateConfig}.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field types.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [closure]
 * search_depth = 3
 * prune = false
 * `);
 * console.log(config.closure.search_depth); // 3
 * console.log(config.proof.method); // "date"
 * ```
 */
export function parseConfig(tomlContent: string): ProverConfig {
  let parsed: RawSection;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    numeric: parseNumeric(section(parsed, 'numeric')),
    closure: parseClosure(section(parsed, 'closure')),
    proof: parseProof(section(parsed, 'proof')),
    logging: parseLogging(section(parsed, 'logging')),
  };
}

/**
 * Returns a copy of the default configuration.
 */
export function getDefaultConfig(): ProverConfig {
  return {
    numeric: { ...DEFAULT_CONFIG.numeric },
    closure: { ...DEFAULT_CONFIG.closure },
    proof: { ...DEFAULT_CONFIG.proof },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}
