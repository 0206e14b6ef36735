/**
 * Source of randomness for template picks, asset picks, person shuffles and
 * window offsets. Injected everywhere so tests can pin the outcome.
 */
export interface RandomSource {
  /** Uniform integer in [min, max], both bounds inclusive */
  integer(min: number, max: number): number;
}

export const mathRandom: RandomSource = {
  integer(min: number, max: number): number {
    return min + Math.floor(Math.random() * (max - min + 1));
  },
};

/**
 * Picks one element uniformly at random, or undefined for an empty list.
 */
export function pickOne<T>(random: RandomSource, items: readonly T[]): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  return items[random.integer(0, items.length - 1)];
}

/**
 * Fisher-Yates shuffle into a new array; the input is left untouched.
 */
export function shuffled<T>(random: RandomSource, items: readonly T[]): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = random.integer(0, i);
    const current = result[i];
    result[i] = result[j];
    result[j] = current;
  }
  return result;
}
