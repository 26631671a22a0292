import type { RandomSource } from '../src/random.js';

/**
 * Random source replaying fixed draws, cycling when exhausted
 */
export function scriptedRandom(values: readonly number[]): RandomSource {
  let index = 0;
  return {
    next: () => {
      const value = values[index % values.length];
      index++;
      return value;
    },
  };
}
