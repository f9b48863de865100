/**
 * Core module exports
 */

// Error handling system
export { AINError, ErrorCode, isAINError, wrapError } from './errors';

// Tagged results
export type { Ok, Err, Result } from './result';
export { ok, err, isOk, isErr, map, andThen, unwrap, unwrapOr } from './result';

// Configuration defaults
export type { ToleranceOptions, SummaryOptions, GraphOptions } from './config';
export {
  DEFAULT_TOLERANCE,
  DEFAULT_SUMMARY_PRECISION,
  DEFAULT_EDGE_DECIMALS,
  DEFAULT_GRAPH_OPTIONS,
} from './config';

// Value type and distribution contract
export type { AINRecord, AINTuple } from './ain/AIN';
export { AIN } from './ain/AIN';
export type { Distribution } from './distributions/Distribution';

// Algebra and comparisons
export * from './algebra';
export { gt, ge, lt, le, eq } from './comparison/stochastic';

// Collaborators
export type { QuantileSegment } from './metrics/distances';
export { w1, w2, wInf, quantileSegments } from './metrics/distances';
export * from './data';
export { RNG, defaultRNG } from './math/random';
