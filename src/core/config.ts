/**
 * Library defaults
 *
 * Options objects are resolved per call against these values; nothing here is
 * mutated at run time.
 */

/**
 * Absolute tolerance for boundary and degeneracy checks
 */
export const DEFAULT_TOLERANCE = 1e-9;

/** Decimal places printed by AIN summaries */
export const DEFAULT_SUMMARY_PRECISION = 6;

/** Decimal places kept on comparison-graph edge weights */
export const DEFAULT_EDGE_DECIMALS = 4;

export interface ToleranceOptions {
  tolerance?: number;
}

export interface SummaryOptions {
  precision?: number;
}

export interface GraphOptions {
  /** Directed graphs keep one weighted edge per ordered pair */
  directed?: boolean;
  /** Edges with weight at or below this value are dropped */
  edgeThreshold?: number;
  /** Directed only: keep just the dominant direction of each pair */
  dominanceOnly?: boolean;
}

export const DEFAULT_GRAPH_OPTIONS: Required<GraphOptions> = {
  directed: false,
  edgeThreshold: 0,
  dominanceOnly: false,
};

export function resolveTolerance(options: ToleranceOptions = {}): number {
  return options.tolerance ?? DEFAULT_TOLERANCE;
}
