import { describe, expect, it } from 'vitest';
import { endsWith, join, matches, replace, split, startsWith, trim } from '../src/functions/string.js';
import { includes, length, number, string } from '../src/functions/value.js';

describe('string functions', () => {
  it('splits and joins', () => {
    expect(split('a,b,c', ',')).toEqual(['a', 'b', 'c']);
    expect(join([1, 'x', true], '-')).toBe('1-x-true');
    expect(() => join('abc', '-')).toThrow('join() requires an array as first argument');
  });

  it('replaces every literal occurrence', () => {
    expect(replace('a.b.c', '.', '/')).toBe('a/b/c');
  });

  it('matches regular expressions', () => {
    expect(matches('build 1234 ok', '\\d{4}')).toBe(true);
    expect(matches('build ok', '^\\d+$')).toBe(false);
  });

  it('tests prefixes and suffixes', () => {
    expect(startsWith('caserun', 'case')).toBe(true);
    expect(endsWith('caserun', 'case')).toBe(false);
    expect(trim('  x \n')).toBe('x');
  });

  it('names the offending argument', () => {
    expect(() => split('a', 1)).toThrow('split() requires a string as second argument');
  });
});

describe('value functions', () => {
  it('measures strings and arrays', () => {
    expect(length('four')).toBe(4);
    expect(length([1, 2])).toBe(2);
    expect(() => length(3)).toThrow(TypeError);
  });

  it('checks membership', () => {
    expect(includes('haystack', 'st')).toBe(true);
    expect(includes([1, 2], 2)).toBe(true);
    expect(() => includes('abc', 1)).toThrow(/requires a string to search for/);
  });

  it('converts values', () => {
    expect(string({ a: 1 })).toBe('{"a":1}');
    expect(string(undefined)).toBe('undefined');
    expect(number(' 12 ')).toBe(12);
    expect(() => number('')).toThrow('number() cannot convert ""');
    expect(() => number('x1')).toThrow(TypeError);
  });
});
