import { describe, expect, it } from 'vitest';

import { countMatchingChars, isMatch, scoreCandidate } from '../src/evaluator.js';

describe('countMatchingChars', () => {
  it('counts position-wise matches', () => {
    expect(countMatchingChars('FOO', 'OOF')).toBe(1);
    expect(countMatchingChars('ABC', 'ABC')).toBe(3);
  });

  it('stops at the shorter string', () => {
    expect(countMatchingChars('FOOBAR', 'FOO')).toBe(3);
    expect(countMatchingChars('FOO', 'FOOBAR')).toBe(3);
    expect(countMatchingChars('', 'ABC')).toBe(0);
  });

  it('is symmetric', () => {
    const pairs: Array<[string, string]> = [
      ['HELLO', 'HOLLA'],
      ['weasel', 'Weasel'],
      ['abc', 'xyz'],
    ];
    for (const [a, b] of pairs) {
      expect(countMatchingChars(a, b)).toBe(countMatchingChars(b, a));
    }
  });

  it('is case-sensitive', () => {
    expect(countMatchingChars('abc', 'ABC')).toBe(0);
  });

  it('accepts pre-split characters', () => {
    expect(countMatchingChars(['😀', 'a'], '😀b')).toBe(1);
    expect(scoreCandidate('Hello!', Array.from('Hellx!'))).toBe(5);
  });

  it('compares code points', () => {
    expect(countMatchingChars('😀a', '😀b')).toBe(1);
    expect(countMatchingChars('😀x', '😁x')).toBe(1);
  });
});

describe('scoreCandidate', () => {
  it('scores against the phrase', () => {
    expect(scoreCandidate('Hellx!', 'Hello!')).toBe(5);
    expect(isMatch('Hello!', 'Hello!')).toBe(true);
    expect(isMatch('Hello?', 'Hello!')).toBe(false);
  });
});
