/**
 * Exponent Pair Prover
 *
 * Derives van der Corput exponent pairs from known results: closure under the
 * A and B transforms, convex hulls, bounds on beta, and proof search with
 * provenance.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './numeric/index.js';
export * from './geometry/index.js';
export * from './knowledge/index.js';
export * from './beta/index.js';
export * from './exponent-pair/index.js';
export * from './config/index.js';
export { Logger, silentLogger } from './utils/logger.js';
export type { LogEntry, LoggerOptions, LogLevel } from './utils/logger.js';
