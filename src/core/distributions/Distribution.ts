import type { RNG } from '../math/random';

/**
 * Distribution queries shared by every bounded density in the library
 */
export interface Distribution {
  /**
   * Probability density function
   */
  pdf(x: number): number;

  /**
   * Cumulative distribution function
   */
  cdf(x: number): number;

  /**
   * Inverse CDF; rejects probabilities outside [0, 1]
   */
  quantile(p: number): number;

  /**
   * Draw values by inversion of uniform variates
   */
  sample(n: number, rng?: RNG): number[];

  /**
   * Support of the distribution (where the density is positive)
   */
  support(): { min: number; max: number };
}
