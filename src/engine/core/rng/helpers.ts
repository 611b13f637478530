import { type RandomGenerator } from "./interface";

export function pickOne<T>(
  rng: RandomGenerator,
  options: ReadonlyArray<T>,
): { value: T; newRng: RandomGenerator } {
  if (options.length === 0) {
    throw new Error("Cannot pick from an empty list");
  }
  const draw = rng.nextInt(options.length);
  const value = options[draw.value];
  if (value === undefined) {
    throw new Error(`Draw ${String(draw.value)} out of range`);
  }
  return { newRng: draw.newRng, value };
}

// Shuffle array using Fisher-Yates algorithm
export function shuffle<T>(
  array: ReadonlyArray<T>,
  rng: RandomGenerator,
): { shuffled: Array<T>; newRng: RandomGenerator } {
  const result = [...array];
  let current = rng;

  for (let i = result.length - 1; i > 0; i--) {
    const draw = current.nextInt(i + 1);
    current = draw.newRng;
    const j = draw.value;
    const temp = result[i] as T;
    const otherTemp = result[j] as T;
    // Both are defined: i runs from length-1 to 1 and j from 0 to i
    result[i] = otherTemp;
    result[j] = temp;
  }

  return { newRng: current, shuffled: result };
}
