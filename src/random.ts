/**
 * Random sources
 *
 * Unseeded runs draw from Math.random; seeded runs share one seedrandom
 * generator so that identical configurations replay identical output.
 */

import seedrandom from 'seedrandom';

export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
}

export const defaultRandom: RandomSource = {
  next: () => Math.random(),
};

export function createRandomSource(seed?: string | null): RandomSource {
  if (seed === undefined || seed === null) {
    return defaultRandom;
  }
  const prng = seedrandom(seed);
  return { next: () => prng() };
}

/**
 * Uniform integer in [0, size)
 */
export function pickIndex(random: RandomSource, size: number): number {
  return Math.floor(random.next() * size);
}

/**
 * Uniform integer in [0, 100], both ends included
 */
export function rollPercent(random: RandomSource): number {
  return pickIndex(random, 101);
}
