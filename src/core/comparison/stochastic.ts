/**
 * Stochastic comparison of Asymmetric Interval Numbers
 *
 * Comparisons answer with a probability rather than a boolean: gt(X, Y) is
 * P(X > Y) for independent X and Y distributed by their densities. Scalars
 * and degenerate intervals compare as plain values, infinities included.
 */

import { AIN } from '../ain/AIN';
import type { Operand } from '../algebra/arithmetic';
import { AINError, ErrorCode } from '../errors';
import { ToleranceOptions, resolveTolerance } from '../config';
import { rampIntegral } from './rampIntegral';

interface DensityPiece {
  start: number;
  end: number;
  weight: number;
}

function pieces(x: AIN): DensityPiece[] {
  return [
    { start: x.lower, end: x.expected, weight: x.alpha },
    { start: x.expected, end: x.upper, weight: x.beta },
  ];
}

/**
 * One side of a comparison: a plain value, or an interval with a density
 */
type Side = number | AIN;

function toSide(value: Operand): Side {
  if (typeof value === 'number') {
    if (Number.isNaN(value)) {
      throw new AINError(ErrorCode.RANGE_ERROR, 'Cannot compare against NaN', { value });
    }
    return value;
  }
  if (AIN.isAIN(value)) {
    return value.isDegenerate ? value.lower : value;
  }
  throw new AINError(
    ErrorCode.RANGE_ERROR,
    `Comparison operand must be an AIN or a number, got ${typeof value}`
  );
}

function clampProbability(p: number): number {
  return Math.min(1, Math.max(0, p));
}

/**
 * P(X > Y) for two overlapping non-degenerate intervals.
 *
 * P(X > Y) = ∫ f_Y(y)·P(X > y) dy, and on each constant piece [a, b) of X the
 * survival term is weight·max(0, b − max(y, a)); summing the four piece pairs
 * gives the exact probability.
 */
function overlapProbability(x: AIN, y: AIN): number {
  let total = 0;
  for (const yp of pieces(y)) {
    for (const xp of pieces(x)) {
      total += yp.weight * xp.weight * rampIntegral(yp.start, yp.end, xp.end, xp.start);
    }
  }
  return clampProbability(total);
}

function greater(x: Side, y: Side, tolerance: number): number {
  if (typeof x === 'number' && typeof y === 'number') {
    return x > y + tolerance ? 1 : 0;
  }
  if (typeof y === 'number') return clampProbability(1 - x.cdf(y));
  if (typeof x === 'number') return clampProbability(y.cdf(x));

  if (x.upper <= y.lower) return 0;
  if (y.upper <= x.lower) return 1;

  return overlapProbability(x, y);
}

/**
 * P(X > Y)
 */
export function gt(x: AIN, y: Operand, options: ToleranceOptions = {}): number {
  return greater(toSide(x), toSide(y), resolveTolerance(options));
}

/**
 * P(X < Y)
 */
export function lt(x: AIN, y: Operand, options: ToleranceOptions = {}): number {
  return greater(toSide(y), toSide(x), resolveTolerance(options));
}

/**
 * Probability mass on X = Y, which is nonzero only for two equal points
 */
export function eq(x: AIN, y: Operand, options: ToleranceOptions = {}): number {
  const a = toSide(x);
  const b = toSide(y);
  if (typeof a !== 'number' || typeof b !== 'number') return 0;
  // Equal infinities differ by NaN
  return a === b || Math.abs(a - b) <= resolveTolerance(options) ? 1 : 0;
}

export function ge(x: AIN, y: Operand, options: ToleranceOptions = {}): number {
  return Math.max(gt(x, y, options), eq(x, y, options));
}

export function le(x: AIN, y: Operand, options: ToleranceOptions = {}): number {
  return Math.max(lt(x, y, options), eq(x, y, options));
}
