import { describe, it, expect } from 'vitest';
import { Counter } from '../counter.js';
import { ClassResolver } from '../../charset/class-resolver.js';
import { getCategoryTable } from '../../charset/categories.js';
import { parsePattern } from '../../parser/pattern-parser.js';
import { isErr } from '../../types/result.js';
import { UnsupportedConstructError } from '../../types/errors.js';
import { formatCardinality } from '../../util/cardinality.js';

function count(source: string, flags = '', alphabet?: string): string {
  const parsed = parsePattern(source, flags);
  if (isErr(parsed)) throw parsed.error;
  const resolver = new ClassResolver(getCategoryTable(alphabet));
  return formatCardinality(new Counter(parsed.value, resolver).count());
}

describe('Counter', () => {
  it.each([
    ['a', '1'],
    ['', '1'],
    ['[a-z]', '26'],
    ['\\d', '10'],
    ['[01]{3}', '8'],
    ['(a|b|c)', '3'],
    ['[ab]{2,3}', '12'],
    ['a?', '2'],
    ['a{0,2}', '3'],
    ['(\\d)\\1', '10'],
    ['yes|no', '2'],
    ['^a$', '1'],
    ['\\W', '37'],
    ['\\D', '90'],
    ['\\S', '94'],
    ['.', '98'],
    ['[^a]', '99'],
  ])('counts /%s/ as %s', (source, expected) => {
    expect(count(source)).toBe(expected);
  });

  it('counts the wildcard with dotAll over the whole printable set', () => {
    expect(count('.', 's')).toBe('100');
  });

  it('counts word characters from the configured alphabet', () => {
    expect(count('\\w', '', 'abc')).toBe('14');
    expect(count('[^\\w]', '', 'abc')).toBe('37');
  });

  it('treats open-ended quantifiers as infinite', () => {
    expect(count('a*')).toBe('infinite');
    expect(count('b|a+')).toBe('infinite');
    expect(count('x(a{2,})')).toBe('infinite');
  });

  it('collapses an infinite body repeated zero times', () => {
    expect(count('(a*){0}')).toBe('1');
    expect(count('(a*){0,1}')).toBe('infinite');
  });

  it('counts an empty class as zero, but one when optional', () => {
    expect(count('[^\\s\\S]')).toBe('0');
    expect(count('[^\\s\\S]?')).toBe('1');
    expect(count('[^\\s\\S]{1,3}')).toBe('0');
  });

  it('lets zero absorb an infinite factor', () => {
    expect(count('[^\\s\\S]a*')).toBe('0');
  });

  it('counts lookahead bodies and treats negative lookahead as one', () => {
    expect(count('(?=[ab])[ab]')).toBe('4');
    expect(count('a(?!b)')).toBe('1');
  });

  it('counts large patterns exactly', () => {
    expect(count('[a-f0-9]{32}')).toBe((16n ** 32n).toString());
  });

  it('throws for unsupported constructs', () => {
    expect(() => count('(?<=a)b')).toThrow(UnsupportedConstructError);
  });
});
