/**
 * Semantic validation for configuration values.
 *
 * Parsing only checks types. This module checks that numeric settings are
 * integers inside the ranges the engine accepts.
 *
 * @packageDocumentation
 */

import { isProofOptimizationMethod, PROOF_OPTIMIZATION_METHODS } from '../exponent-pair/types.js';
import type { ProverConfig } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

/** Inclusive bounds for `numeric.precision` (decimal digits). */
export const PRECISION_RANGE = { min: 1, max: 1000 } as const;

/** Inclusive bounds for `closure.search_depth`. */
export const SEARCH_DEPTH_RANGE = { min: 0, max: 50 } as const;

function validateIntegerRange(
  value: number,
  fieldPath: string,
  range: { readonly min: number; readonly max: number },
  errors: ValidationError[]
): void {
  if (!Number.isInteger(value)) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be an integer, got ${String(value)}`,
    });
    return;
  }

  if (value < range.min || value > range.max) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be between ${String(range.min)} and ${String(range.max)}, got ${String(value)}`,
    });
  }
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig('[closure]\nsearch_depth = -1'));
 * result.valid; // false
 * result.errors[0]?.field; // "closure.search_depth"
 * ```
 */
export function validateConfig(config: ProverConfig): ValidationResult {
  const errors: ValidationError[] = [];

  validateIntegerRange(config.numeric.precision, 'numeric.precision', PRECISION_RANGE, errors);
  validateIntegerRange(
    config.closure.search_depth,
    'closure.search_depth',
    SEARCH_DEPTH_RANGE,
    errors
  );

  // Configs built in code bypass the parser's method check.
  const method: string = config.proof.method;
  if (!isProofOptimizationMethod(method)) {
    errors.push({
      field: 'proof.method',
      value: method,
      message: `'proof.method' must be one of ${PROOF_OPTIMIZATION_METHODS.join(', ')}, got '${method}'`,
    });
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: ProverConfig): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
