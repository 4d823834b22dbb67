/** Random number generator interface (for testability) */
export interface RandomGenerator {
  /** Returns a random float in [0, 1) */
  random(): number;
}

/** Default RNG using Math.random */
export const defaultRng: RandomGenerator = {
  random: () => Math.random()
};

/**
 * Seeded random number generator using Linear Congruential Generator (LCG)
 * This ensures deterministic randomness for match replay
 */
export class SeededRandom implements RandomGenerator {
  private seed: number;

  constructor(seed: number) {
    this.seed = seed;
  }

  /**
   * Generate next random number between 0 and 1
   * Uses Park and Miller's "minimal standard" LCG constants
   */
  random(): number {
    // LCG formula: (a * seed) % m
    // Using Park & Miller constants: a = 16807, m = 2^31 - 1
    const a = 16807;
    const m = 2147483647; // 2^31 - 1

    this.seed = (a * this.seed) % m;
    return this.seed / m;
  }
}

/**
 * Create a seeded RNG from a seed value
 * Ensures seed is a positive integer
 */
export function createSeededRandom(seed: number): SeededRandom {
  // Ensure seed is a positive integer below the modulus
  const safeSeed = (Math.abs(Math.floor(seed)) % 2147483647) || 1;
  return new SeededRandom(safeSeed);
}
