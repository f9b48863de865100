/**
 * Transcendental functions of Asymmetric Interval Numbers
 *
 * Expected values follow the law of the unconscious statistician: for an
 * antiderivative F of g, E[g(X)] = alpha·(F(e) − F(l)) + beta·(F(u) − F(e)).
 * Each piece is evaluated as its mass times the mean of g over the piece,
 * (F(b) − F(a)) / (b − a), written in a form that does not cancel when the
 * piece is narrow.
 */

import { AIN } from '../ain/AIN';
import { AINError, ErrorCode } from '../errors';
import { Result, andThen, err } from '../result';
import { multiply } from './arithmetic';

const TWO_PI = 2 * Math.PI;
const HALF_PI = Math.PI / 2;

/**
 * Mean of a function over [a, b], a < b
 */
type PieceMean = (a: number, b: number) => number;

function lotus(x: AIN, mean: PieceMean): number {
  return (
    x.lowerMass * mean(x.lower, x.expected) +
    x.beta * (x.upper - x.expected) * mean(x.expected, x.upper)
  );
}

// cos a − cos b and sin b − sin a as products
function cosineGap(a: number, b: number): number {
  return 2 * Math.sin((a + b) / 2) * Math.sin((b - a) / 2);
}

function sineGap(a: number, b: number): number {
  return 2 * Math.cos((a + b) / 2) * Math.sin((b - a) / 2);
}

// F(t) = t·ln t − t
const meanLog: PieceMean = (a, b) =>
  Math.log(b) - 1 + (a / (b - a)) * Math.log1p((b - a) / a);

// F = exp
const meanExp: PieceMean = (a, b) => (Math.exp(a) * Math.expm1(b - a)) / (b - a);

// F = −cos
const meanSin: PieceMean = (a, b) => cosineGap(a, b) / (b - a);

// F = sin
const meanCos: PieceMean = (a, b) => sineGap(a, b) / (b - a);

// F(t) = −ln|cos t|; cos keeps its sign between asymptotes
const meanTan: PieceMean = (a, b) => Math.log1p(cosineGap(a, b) / Math.cos(b)) / (b - a);

// F(t) = base^t / ln(base)
function meanPow(base: number): PieceMean {
  const lnBase = Math.log(base);
  return (a, b) => (base ** a * Math.expm1((b - a) * lnBase)) / ((b - a) * lnBase);
}

function pointwise(value: number): Result<AIN> {
  return AIN.derive(value, value, value);
}

/**
 * Whether phase + k·period falls in [lower, upper] for some integer k
 */
function hitsPhase(x: AIN, phase: number, period: number): boolean {
  const kMin = Math.ceil((x.lower - phase) / period);
  const kMax = Math.floor((x.upper - phase) / period);
  return kMin <= kMax;
}

/**
 * Image of a periodic function: endpoint values plus any interior extremum
 */
function periodicBounds(
  x: AIN,
  fn: (t: number) => number,
  maxPhase: number,
  minPhase: number
): [number, number] {
  const atLower = fn(x.lower);
  const atUpper = fn(x.upper);
  const lower = hitsPhase(x, minPhase, TWO_PI) ? -1 : Math.min(atLower, atUpper);
  const upper = hitsPhase(x, maxPhase, TWO_PI) ? 1 : Math.max(atLower, atUpper);
  return [lower, upper];
}

export function log(x: AIN): Result<AIN> {
  if (x.lower <= 0) {
    return err(
      new AINError(
        ErrorCode.DOMAIN_ERROR,
        `Logarithm requires a positive lower bound, got ${x.lower}`,
        { interval: x.toJSON() }
      )
    );
  }
  if (x.isDegenerate) return pointwise(Math.log(x.lower));

  return AIN.derive(Math.log(x.lower), Math.log(x.upper), lotus(x, meanLog));
}

export function log2(x: AIN): Result<AIN> {
  return andThen(log(x), (ln) => multiply(ln, Math.LOG2E));
}

export function log10(x: AIN): Result<AIN> {
  return andThen(log(x), (ln) => multiply(ln, Math.LOG10E));
}

export function exp(x: AIN): Result<AIN> {
  if (x.isDegenerate) return pointwise(Math.exp(x.lower));
  return AIN.derive(Math.exp(x.lower), Math.exp(x.upper), lotus(x, meanExp));
}

export function sin(x: AIN): Result<AIN> {
  if (x.isDegenerate) return pointwise(Math.sin(x.lower));

  const [lower, upper] = periodicBounds(x, Math.sin, HALF_PI, -HALF_PI);
  return AIN.derive(lower, upper, lotus(x, meanSin));
}

export function cos(x: AIN): Result<AIN> {
  if (x.isDegenerate) return pointwise(Math.cos(x.lower));

  const [lower, upper] = periodicBounds(x, Math.cos, 0, Math.PI);
  return AIN.derive(lower, upper, lotus(x, meanCos));
}

/**
 * Tangent. Rejects any interval reaching an asymptote π/2 + kπ, on which
 * the function is discontinuous; elsewhere it is increasing.
 */
export function tan(x: AIN): Result<AIN> {
  if (hitsPhase(x, HALF_PI, Math.PI)) {
    return err(
      new AINError(
        ErrorCode.DOMAIN_ERROR,
        `Tangent is undefined on ${x.toString()} because it reaches an asymptote at π/2 + kπ`,
        { interval: x.toJSON() }
      )
    );
  }
  if (x.isDegenerate) return pointwise(Math.tan(x.lower));

  return AIN.derive(Math.tan(x.lower), Math.tan(x.upper), lotus(x, meanTan));
}

/**
 * base^X for a scalar base
 */
export function rpow(base: number, x: AIN): Result<AIN> {
  if (!(base > 0) || base === 1 || !Number.isFinite(base)) {
    return err(
      new AINError(
        ErrorCode.DOMAIN_ERROR,
        `Exponential base must be positive, finite and different from 1, got ${base}`,
        { base }
      )
    );
  }
  if (x.isDegenerate) return pointwise(base ** x.lower);

  const atLower = base ** x.lower;
  const atUpper = base ** x.upper;
  return AIN.derive(
    Math.min(atLower, atUpper),
    Math.max(atLower, atUpper),
    lotus(x, meanPow(base))
  );
}

/**
 * X^Y for two intervals, as exp(Y · ln X)
 */
export function powAIN(x: AIN, y: AIN): Result<AIN> {
  return andThen(
    andThen(log(x), (ln) => multiply(y, ln)),
    exp
  );
}
