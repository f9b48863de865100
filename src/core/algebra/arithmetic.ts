/**
 * Arithmetic on Asymmetric Interval Numbers
 *
 * Each operation derives new bounds from the operands' bounds and a new
 * expected value from the operands' densities, then rebuilds the result
 * through AIN.create so invariant failures come back as an Err.
 */

import { AIN } from '../ain/AIN';
import { AINError, ErrorCode } from '../errors';
import { Result, andThen, err, ok } from '../result';

/**
 * Right-hand operand of a binary operation: a scalar or another interval
 */
export type Operand = number | AIN;

function extremes(values: number[]): [number, number] {
  return [Math.min(...values), Math.max(...values)];
}

/**
 * E[1/X] for a non-degenerate interval that excludes zero
 */
export function reciprocalMoment(x: AIN): number {
  return (
    x.alpha * Math.log1p((x.expected - x.lower) / x.lower) +
    x.beta * Math.log1p((x.upper - x.expected) / x.expected)
  );
}

function containsZero(x: AIN): boolean {
  return x.lower <= 0 && 0 <= x.upper;
}

export function negate(x: AIN): Result<AIN> {
  return AIN.derive(-x.upper, -x.lower, -x.expected);
}

export function add(x: AIN, y: Operand): Result<AIN> {
  if (typeof y === 'number') {
    return AIN.derive(x.lower + y, x.upper + y, x.expected + y);
  }
  return AIN.derive(x.lower + y.lower, x.upper + y.upper, x.expected + y.expected);
}

export function subtract(x: AIN, y: Operand): Result<AIN> {
  if (typeof y === 'number') {
    return AIN.derive(x.lower - y, x.upper - y, x.expected - y);
  }
  return AIN.derive(x.lower - y.upper, x.upper - y.lower, x.expected - y.expected);
}

/**
 * scalar − X
 */
export function rsubtract(scalar: number, x: AIN): Result<AIN> {
  return AIN.derive(scalar - x.upper, scalar - x.lower, scalar - x.expected);
}

/**
 * Interval product. The expected value is the product of the expected values,
 * which treats the operands as independent rather than convolving densities.
 */
export function multiply(x: AIN, y: Operand): Result<AIN> {
  if (typeof y === 'number') {
    const [lower, upper] = extremes([x.lower * y, x.upper * y]);
    return AIN.derive(lower, upper, x.expected * y);
  }

  const [lower, upper] = extremes([
    x.lower * y.lower,
    x.lower * y.upper,
    x.upper * y.lower,
    x.upper * y.upper,
  ]);
  return AIN.derive(lower, upper, x.expected * y.expected);
}

export function divide(x: AIN, y: Operand): Result<AIN> {
  if (typeof y === 'number') {
    if (y === 0) {
      return err(new AINError(ErrorCode.DOMAIN_ERROR, 'Division by zero', { divisor: y }));
    }
    const [lower, upper] = extremes([x.lower / y, x.upper / y]);
    return AIN.derive(lower, upper, x.expected / y);
  }

  if (containsZero(y)) {
    return err(
      new AINError(
        ErrorCode.DOMAIN_ERROR,
        `Division by ${y.toString()} is undefined because 0 is included in the interval`,
        { divisor: y.toJSON() }
      )
    );
  }

  const [lower, upper] = extremes([
    x.lower / y.lower,
    x.lower / y.upper,
    x.upper / y.lower,
    x.upper / y.upper,
  ]);

  if (y.isDegenerate) {
    return AIN.derive(lower, upper, (lower + upper) / 2);
  }
  return AIN.derive(lower, upper, x.expected * reciprocalMoment(y));
}

/**
 * scalar / X, as scalar · X^-1
 */
export function rdivide(scalar: number, x: AIN): Result<AIN> {
  return andThen(power(x, -1), (reciprocal) => multiply(reciprocal, scalar));
}

/**
 * Real power X^n.
 *
 * The expected value is the n-th raw moment of the density, or E[1/X] for
 * n = -1. An interval straddling zero keeps 0 as a candidate lower bound.
 */
export function power(x: AIN, n: number): Result<AIN> {
  if (!Number.isFinite(n)) {
    return err(new AINError(ErrorCode.RANGE_ERROR, `Exponent must be finite, got ${n}`, { n }));
  }

  if (!Number.isInteger(n) && x.lower < 0) {
    return err(
      new AINError(
        ErrorCode.COMPLEX_RESULT,
        `The operation cannot be executed because the result is complex for n = ${n}`,
        { n, lower: x.lower }
      )
    );
  }

  if (n < 0 && containsZero(x)) {
    return err(
      new AINError(
        ErrorCode.DOMAIN_ERROR,
        'The operation cannot be executed because 0 is included in the interval',
        { n, interval: x.toJSON() }
      )
    );
  }

  if (n === 0) {
    return ok(AIN.point(1));
  }

  if (x.isDegenerate) {
    const value = x.lower ** n;
    return AIN.derive(value, value, value);
  }

  const atLower = x.lower ** n;
  const atUpper = x.upper ** n;
  const straddles = x.lower < 0 && x.upper > 0;
  const lower = straddles ? Math.min(0, atLower) : Math.min(atLower, atUpper);
  const upper = Math.max(atLower, atUpper);

  if (n === -1) {
    return AIN.derive(lower, upper, reciprocalMoment(x));
  }

  const m = n + 1;
  const expected =
    (x.alpha * (x.expected ** m - x.lower ** m)) / m +
    (x.beta * (x.upper ** m - x.expected ** m)) / m;
  return AIN.derive(lower, upper, expected);
}
