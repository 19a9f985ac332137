/**
 * Errors raised by the exponent-pair engine.
 *
 * Structurally insufficient input (no known pairs, bounds that do not cover
 * [0, 1/2]) is not an error: those cases return an empty or "no result" value.
 *
 * @packageDocumentation
 */

import { HypothesisSet } from '../knowledge/hypothesis-set.js';

/**
 * Error class for calls that break an operation's contract, such as passing
 * something other than a HypothesisSet.
 */
export class ContractViolationError extends Error {
  /** The operation whose contract was violated. */
  public readonly operation: string;

  /**
   * Creates a new ContractViolationError.
   *
   * @param operation - Name of the called operation.
   * @param message - What was wrong with the call.
   */
  constructor(operation: string, message: string) {
    super(`${operation}: ${message}`);
    this.name = 'ContractViolationError';
    this.operation = operation;
  }
}

/**
 * Error class for an unrecognized proof optimization method.
 */
export class UnimplementedMethodError extends Error {
  /** The rejected method. */
  public readonly method: string;

  /**
   * Creates a new UnimplementedMethodError.
   *
   * @param method - The unrecognized method.
   */
  constructor(method: string) {
    super(`Proof optimization method '${method}' is not implemented`);
    this.name = 'UnimplementedMethodError';
    this.method = method;
  }
}

/**
 * Asserts that an argument is a HypothesisSet.
 *
 * @param value - The argument.
 * @param operation - Name of the operation, for the error message.
 * @throws ContractViolationError if it is not.
 */
export function assertHypothesisSet(
  value: unknown,
  operation: string
): asserts value is HypothesisSet {
  if (!(value instanceof HypothesisSet)) {
    throw new ContractViolationError(
      operation,
      `expected a HypothesisSet, got ${value === null ? 'null' : typeof value}`
    );
  }
}
