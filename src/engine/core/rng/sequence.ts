import { type RandomGenerator } from "./interface";

/**
 * RNG that yields a fixed sequence and then repeats.
 * Each draw is reduced modulo the requested bound.
 * Each call returns a new RNG instance with advanced index (immutable style).
 */
export class SequenceRng implements RandomGenerator {
  constructor(
    private readonly sequence: ReadonlyArray<number>,
    private readonly index = 0,
  ) {
    if (sequence.length === 0) throw new Error("Sequence must not be empty");
  }

  nextInt(bound: number): { value: number; newRng: RandomGenerator } {
    const raw = this.sequence[this.index];
    if (raw === undefined) throw new Error("Sequence index out of bounds");
    const nextIndex = (this.index + 1) % this.sequence.length;
    return {
      newRng: new SequenceRng(this.sequence, nextIndex),
      value: raw % bound,
    };
  }
}
