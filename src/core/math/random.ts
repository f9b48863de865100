/**
 * Seeded random number generation for quantile-inversion sampling
 */

import { Random, MersenneTwister19937 } from 'random-js';

/**
 * Seeded random number generator using Mersenne Twister
 */
export class RNG {
  private random: Random;
  private engine: MersenneTwister19937;

  constructor(seed?: number) {
    this.engine = seed !== undefined
      ? MersenneTwister19937.seed(seed)
      : MersenneTwister19937.autoSeed();
    this.random = new Random(this.engine);
  }

  /**
   * Reset the RNG with a new seed
   */
  setSeed(seed: number): void {
    this.engine = MersenneTwister19937.seed(seed);
    this.random = new Random(this.engine);
  }

  /**
   * Uniform random in [0, 1)
   */
  uniform(): number {
    return this.random.real(0, 1, false);
  }
}

// Default RNG instance (unseeded)
export const defaultRNG = new RNG();
