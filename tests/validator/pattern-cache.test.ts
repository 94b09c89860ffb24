import { describe, expect, test } from '@jest/globals';
import { SpecDefinitionError } from '../../src/errors/spec-error';
import { PatternCache } from '../../src/validator/pattern-cache';

describe('PatternCache', () => {
  test('returns the same RegExp for a repeated pattern', () => {
    const cache = new PatternCache(4);
    const first = cache.compile('^a+$');
    expect(cache.compile('^a+$')).toBe(first);
    expect(cache.size).toBe(1);
  });

  test('evicts the least recently used pattern', () => {
    const cache = new PatternCache(2);
    const a = cache.compile('a');
    cache.compile('b');
    cache.compile('a');
    cache.compile('c');

    expect(cache.size).toBe(2);
    expect(cache.compile('a')).toBe(a);
    expect(cache.size).toBe(2);
  });

  test('compiles without storing when the size is zero', () => {
    const cache = new PatternCache(0);
    const first = cache.compile('x');
    expect(cache.compile('x')).not.toBe(first);
    expect(cache.size).toBe(0);
  });

  test('throws SpecDefinitionError for invalid patterns, cached or not', () => {
    const cache = new PatternCache(4);
    expect(() => cache.compile('(')).toThrow(SpecDefinitionError);
    expect(() => cache.compile('(')).toThrow(/Invalid regular expression/);
    expect(cache.size).toBe(1);

    try {
      cache.compile('(');
    } catch (error) {
      expect(error).toBeInstanceOf(SpecDefinitionError);
      if (error instanceof SpecDefinitionError) {
        expect(error.code).toBe('SPEC_PATTERN_INVALID');
      }
    }
  });
});
