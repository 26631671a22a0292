/**
 * Character handling
 *
 * Strings are handled as sequences of code points so that characters
 * outside the Basic Multilingual Plane count once.
 */

export function toChars(text: string): string[] {
  return Array.from(text);
}

/**
 * Distinct characters of a set in first-occurrence order
 */
export function toCharSet(charSet: string): string[] {
  return Array.from(new Set(toChars(charSet)));
}

/**
 * A set given as an array is taken as already distinct (see toCharSet)
 */
export function resolveCharSet(charSet: string | readonly string[]): readonly string[] {
  return typeof charSet === 'string' ? toCharSet(charSet) : charSet;
}

export function charLength(text: string): number {
  return toChars(text).length;
}

/**
 * Characters of the phrase that the set can never produce
 */
export function missingChars(phrase: string, charSet: string): string[] {
  const allowed = new Set(toChars(charSet));
  return toCharSet(phrase).filter((c) => !allowed.has(c));
}
