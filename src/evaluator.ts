/**
 * Fitness Evaluator
 *
 * A candidate's fitness is the number of positions where it matches the
 * target phrase. Comparison is exact: case-sensitive, no normalization.
 */

import { toChars } from './charset.js';

type Chars = string | readonly string[];

function asChars(value: Chars): readonly string[] {
  return typeof value === 'string' ? toChars(value) : value;
}

/**
 * Count positions holding the same character in both strings, up to the
 * length of the shorter one. Pre-split arrays are compared as given.
 */
export function countMatchingChars(a: Chars, b: Chars): number {
  const charsA = asChars(a);
  const charsB = asChars(b);
  const length = Math.min(charsA.length, charsB.length);

  let matches = 0;
  for (let i = 0; i < length; i++) {
    if (charsA[i] === charsB[i]) {
      matches++;
    }
  }

  return matches;
}

export function scoreCandidate(text: Chars, phrase: Chars): number {
  return countMatchingChars(text, phrase);
}

export function isMatch(text: string, phrase: string): boolean {
  return text === phrase;
}
