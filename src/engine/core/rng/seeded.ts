import { type RandomGenerator } from "./interface";

// Simple seedable RNG state
export type SeededRngState = {
  seed: string;
  internalSeed: number;
};

// Create initial RNG state
export function createRngState(seed = "default"): SeededRngState {
  return {
    internalSeed: hashString(seed),
    seed,
  };
}

// Simple string hash (FNV-1a, 32-bit) for stable seeds
function hashString(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0; // unsigned 32-bit
}

// Simple PRNG (Linear Congruential Generator)
function nextRandom(seed: number): number {
  return (seed * 1664525 + 1013904223) % 2 ** 32;
}

export function nextInt(
  state: SeededRngState,
  bound: number,
): { value: number; newState: SeededRngState } {
  if (!Number.isInteger(bound) || bound <= 0) {
    throw new Error("Random bound must be a positive integer");
  }
  const internalSeed = nextRandom(state.internalSeed);
  // Use high bits mapped to [0, bound) to reduce modulo bias
  const value = Math.floor(((internalSeed >>> 0) / 4294967296) * bound);
  return { newState: { ...state, internalSeed }, value };
}

/**
 * Wrapper class that implements RandomGenerator for SeededRngState
 */
export class SeededRng implements RandomGenerator {
  constructor(private readonly state: SeededRngState) {}

  nextInt(bound: number): { value: number; newRng: RandomGenerator } {
    const result = nextInt(this.state, bound);
    return { newRng: new SeededRng(result.newState), value: result.value };
  }

  getState(): SeededRngState {
    return this.state;
  }
}

export function createSeededRng(seed = "default"): RandomGenerator {
  return new SeededRng(createRngState(seed));
}
