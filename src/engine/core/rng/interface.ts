/**
 * Interface for the engine's random source.
 * Production uses a seeded generator; tests script exact draws.
 */
export type RandomGenerator = {
  /**
   * Draw an integer in [0, bound).
   * Returns the value and a new generator state (immutable pattern)
   */
  nextInt(bound: number): { value: number; newRng: RandomGenerator };
};
