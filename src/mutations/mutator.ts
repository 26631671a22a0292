/**
 * String Generation and Mutation
 *
 * Produces the random start string and the per-generation variants of the
 * current best. Each character gets its own mutation roll, so a rate of 5
 * changes roughly 5% of the characters of every variant.
 */

import { resolveCharSet, toChars } from '../charset.js';
import { ConfigurationError, EmptyCharsetError } from '../errors.js';
import { type RandomSource, defaultRandom, pickIndex, rollPercent } from '../random.js';

/**
 * Draw one character uniformly from a de-duplicated set
 */
function pickChar(chars: readonly string[], random: RandomSource, reason: string): string {
  if (chars.length === 0) {
    throw new EmptyCharsetError(`Couldn't pick character from char set when ${reason}`);
  }
  return chars[pickIndex(random, chars.length)];
}

/**
 * Generate a string of `length` characters drawn from `charSet`
 */
export function generateRandomString(
  length: number,
  charSet: string | readonly string[],
  random: RandomSource = defaultRandom
): string {
  if (!Number.isInteger(length) || length < 0) {
    throw new ConfigurationError(`String length should be a non-negative integer, not ${length}`, 'length');
  }

  const chars = resolveCharSet(charSet);
  let result = '';

  for (let i = 0; i < length; i++) {
    result += pickChar(chars, random, 'generating random string');
  }

  return result;
}

/**
 * Copy `baseText` character by character, replacing each one with a random
 * character from `charSet` when its roll in [0, 100] is at most `mutationRate`
 */
export function mutateString(
  baseText: string | readonly string[],
  charSet: string | readonly string[],
  mutationRate: number,
  random: RandomSource = defaultRandom
): string {
  const chars = resolveCharSet(charSet);
  const base = typeof baseText === 'string' ? toChars(baseText) : baseText;
  let mutated = '';

  for (const c of base) {
    if (rollPercent(random) <= mutationRate) {
      mutated += pickChar(chars, random, 'mutating string');
      continue;
    }

    mutated += c;
  }

  return mutated;
}
