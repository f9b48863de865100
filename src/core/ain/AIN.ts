/**
 * Asymmetric Interval Number
 *
 * A bounded value [lower, upper] with an expected value inside it and a
 * two-piece constant density: `alpha` on [lower, expected), `beta` on
 * [expected, upper). The weights are chosen so the density integrates to one
 * and its mean is exactly `expected`.
 */

import { AINError, ErrorCode } from '../errors';
import { Result, ok, err, unwrap } from '../result';
import {
  DEFAULT_SUMMARY_PRECISION,
  SummaryOptions,
  ToleranceOptions,
  resolveTolerance,
} from '../config';
import type { Distribution } from '../distributions/Distribution';
import { RNG, defaultRNG } from '../math/random';

/**
 * Plain-data form of an AIN
 */
export interface AINRecord {
  lower: number;
  upper: number;
  expected: number;
}

export type AINTuple = [lower: number, upper: number, expected: number];

function formatTriple(lower: number, upper: number, expected: number): string {
  return `[${lower.toFixed(4)}, ${upper.toFixed(4)}]_{${expected.toFixed(4)}}`;
}

export class AIN implements Distribution {
  readonly lower: number;
  readonly upper: number;
  readonly expected: number;
  readonly alpha: number;
  readonly beta: number;
  readonly asymmetry: number;
  readonly variance: number;

  private constructor(lower: number, upper: number, expected: number) {
    this.lower = lower;
    this.upper = upper;
    this.expected = expected;

    if (lower === upper) {
      this.alpha = 1;
      this.beta = 1;
      this.asymmetry = 0;
      this.variance = 0;
    } else {
      const width = upper - lower;
      this.alpha = (upper - expected) / (width * (expected - lower));
      this.beta = (expected - lower) / (width * (upper - expected));
      this.asymmetry = (lower + upper - 2 * expected) / width;
      this.variance =
        (this.alpha * (expected ** 3 - lower ** 3)) / 3 +
        (this.beta * (upper ** 3 - expected ** 3)) / 3 -
        expected ** 2;
    }

    Object.freeze(this);
  }

  /**
   * Validate the triple and build an AIN.
   *
   * A width at or below the tolerance is a degenerate interval and collapses
   * to a point; otherwise the expected value must lie strictly between the
   * bounds.
   */
  static create(
    lower: number,
    upper: number,
    expected: number = (lower + upper) / 2,
    options: ToleranceOptions = {}
  ): Result<AIN> {
    const tolerance = resolveTolerance(options);
    const context = { lower, upper, expected };

    if (!Number.isFinite(lower) || !Number.isFinite(upper) || !Number.isFinite(expected)) {
      return err(
        new AINError(ErrorCode.VALIDATION_ERROR, 'AIN parameters must be finite numbers', context)
      );
    }

    if (lower > upper + tolerance) {
      return err(
        new AINError(
          ErrorCode.VALIDATION_ERROR,
          `Invalid AIN ${formatTriple(lower, upper, expected)}: lower bound exceeds upper bound`,
          context
        )
      );
    }

    if (upper - lower <= tolerance) {
      if (Math.abs(expected - lower) > tolerance) {
        return err(
          new AINError(
            ErrorCode.VALIDATION_ERROR,
            `Invalid AIN ${formatTriple(lower, upper, expected)}: a point interval must have expected equal to its bounds`,
            context
          )
        );
      }
      return ok(new AIN(lower, lower, lower));
    }

    if (expected <= lower || expected >= upper) {
      return err(
        new AINError(
          ErrorCode.VALIDATION_ERROR,
          `Invalid AIN ${formatTriple(lower, upper, expected)}: expected value must lie strictly inside the bounds`,
          context
        )
      );
    }

    return ok(new AIN(lower, upper, expected));
  }

  /**
   * Build an AIN from bounds and an expected value computed by an operator.
   *
   * The expected value of a density on [lower, upper] always lies inside it,
   * so a derived value on or past a bound is rounding error and is moved
   * inside by min(tolerance, width / 4). Non-finite or misordered inputs
   * still fail in {@link AIN.create}.
   */
  static derive(
    lower: number,
    upper: number,
    expected: number,
    options: ToleranceOptions = {}
  ): Result<AIN> {
    const tolerance = resolveTolerance(options);
    const finite = Number.isFinite(lower) && Number.isFinite(upper) && Number.isFinite(expected);
    if (!finite || lower > upper) {
      return AIN.create(lower, upper, expected, options);
    }

    const width = upper - lower;
    if (width <= tolerance) {
      return ok(new AIN(lower, lower, lower));
    }
    if (expected > lower && expected < upper) {
      return ok(new AIN(lower, upper, expected));
    }

    const margin = Math.min(tolerance, width / 4);
    const snapped = expected <= lower ? lower + margin : upper - margin;
    // Near large magnitudes the margin can vanish in rounding
    const inside = snapped > lower && snapped < upper ? snapped : (lower + upper) / 2;
    return ok(new AIN(lower, upper, inside));
  }

  /**
   * Throwing form of {@link AIN.create}
   */
  static of(lower: number, upper: number, expected?: number, options?: ToleranceOptions): AIN {
    return unwrap(AIN.create(lower, upper, expected, options));
  }

  /**
   * Degenerate AIN at a single value
   */
  static point(value: number): AIN {
    return AIN.of(value, value, value);
  }

  static isAIN(value: unknown): value is AIN {
    return value instanceof AIN;
  }

  get isDegenerate(): boolean {
    return this.lower === this.upper;
  }

  get width(): number {
    return this.upper - this.lower;
  }

  get midpoint(): number {
    return (this.lower + this.upper) / 2;
  }

  get stdDev(): number {
    return Math.sqrt(this.variance);
  }

  /**
   * Probability mass on [lower, expected)
   */
  get lowerMass(): number {
    return this.isDegenerate ? 0 : this.alpha * (this.expected - this.lower);
  }

  pdf(x: number): number {
    if (this.isDegenerate) return 0;
    if (x < this.lower) return 0;
    if (x < this.expected) return this.alpha;
    if (x < this.upper) return this.beta;
    return 0;
  }

  cdf(x: number): number {
    if (x < this.lower) return 0;
    if (x < this.expected) return this.alpha * (x - this.lower);
    if (x < this.upper) return this.lowerMass + this.beta * (x - this.expected);
    return 1;
  }

  quantile(p: number): number {
    if (!(p >= 0 && p <= 1)) {
      throw new AINError(
        ErrorCode.RANGE_ERROR,
        `Argument p = ${p} is out of range; it should be between 0 and 1`,
        { p }
      );
    }

    if (this.isDegenerate) return this.lower;

    const split = this.lowerMass;
    if (p < split) {
      return p / this.alpha + this.lower;
    }
    return (p - split) / this.beta + this.expected;
  }

  support(): { min: number; max: number } {
    return { min: this.lower, max: this.upper };
  }

  sample(n: number, rng: RNG = defaultRNG): number[] {
    if (!Number.isInteger(n) || n < 0) {
      throw new AINError(
        ErrorCode.RANGE_ERROR,
        `Sample size must be a non-negative integer, got ${n}`,
        { n }
      );
    }

    const samples: number[] = new Array(n);
    for (let i = 0; i < n; i++) {
      samples[i] = this.quantile(rng.uniform());
    }
    return samples;
  }

  /**
   * Field-wise comparison within an absolute tolerance
   */
  equals(other: AIN, options: ToleranceOptions = {}): boolean {
    const tolerance = resolveTolerance(options);
    return (
      Math.abs(this.lower - other.lower) <= tolerance &&
      Math.abs(this.upper - other.upper) <= tolerance &&
      Math.abs(this.expected - other.expected) <= tolerance
    );
  }

  toJSON(): AINRecord {
    return { lower: this.lower, upper: this.upper, expected: this.expected };
  }

  toTuple(): AINTuple {
    return [this.lower, this.upper, this.expected];
  }

  /**
   * `[lower, upper]_{expected}` with four decimals
   */
  toString(): string {
    return formatTriple(this.lower, this.upper, this.expected);
  }

  /**
   * Aligned table of the derived parameters
   */
  summary(options: SummaryOptions = {}): string {
    const precision = options.precision ?? DEFAULT_SUMMARY_PRECISION;
    if (!Number.isInteger(precision) || precision < 0 || precision > 100) {
      throw new AINError(
        ErrorCode.RANGE_ERROR,
        `Summary precision must be an integer between 0 and 100, got ${precision}`,
        { precision }
      );
    }

    const rows: Array<[string, string]> = [
      ['Alpha', this.alpha.toFixed(precision)],
      ['Beta', this.beta.toFixed(precision)],
      ['Asymmetry', this.asymmetry.toFixed(precision)],
      ['Exp. val.', this.expected.toFixed(precision)],
      ['Variance', this.variance.toFixed(precision)],
      ['Std. dev.', this.stdDev.toFixed(precision)],
      ['Midpoint', this.midpoint.toFixed(precision)],
    ];
    const valueWidth = Math.max(...rows.map(([, value]) => value.length)) + 4;

    return [
      '=== AIN ============================',
      this.toString(),
      '=== Summary ========================',
      ...rows.map(([name, value]) => `${name.padEnd(12)} = ${value.padStart(valueWidth)}`),
      '====================================',
    ].join('\n');
  }
}
