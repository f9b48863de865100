/**
 * asymint - Asymmetric Interval Numbers
 *
 * Bounded uncertain values with a two-piece density, an algebra that carries
 * expected values through arithmetic and transcendental functions, and
 * probabilistic comparisons between them.
 */

export * from './core';

// Comparison graph
export type { GraphEdge } from './domain/graph/IntervalGraph';
export { IntervalGraph } from './domain/graph/IntervalGraph';

// Version
export const VERSION = '0.1.0';
