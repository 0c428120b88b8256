import { describe, it, expect } from 'vitest';
import { ALPHABETS, getAlphabet, listAlphabets } from '../alphabets.js';
import { PATTERNS, isPatternName } from '../patterns.js';
import { ASCII_LETTERS } from '../../charset/categories.js';
import { ConfigError } from '../../types/errors.js';
import { PatternGenerator } from '../../generator/pattern-generator.js';

describe('alphabet catalog', () => {
  it('lists the bundled alphabets', () => {
    expect(listAlphabets()).toContain('ascii');
    expect(listAlphabets()).toContain('greek');
    expect(Object.isFrozen(ALPHABETS)).toBe(true);
  });

  it('expands code point ranges in file order', () => {
    expect(getAlphabet('ascii')).toBe(ASCII_LETTERS);
    const greek = getAlphabet('greek');
    expect([...greek]).toHaveLength(49);
    expect(greek.startsWith('αβγ')).toBe(true);
  });

  it('looks names up case-insensitively', () => {
    expect(getAlphabet('GREEK')).toBe(getAlphabet('greek'));
  });

  it('rejects unknown names', () => {
    expect(() => getAlphabet('klingon')).toThrow(ConfigError);
    expect(() => getAlphabet('klingon')).toThrow('Unknown alphabet "klingon"');
  });
});

describe('pattern catalog', () => {
  it('recognises catalog names', () => {
    expect(isPatternName('UUID4')).toBe(true);
    expect(isPatternName('uuid4')).toBe(false);
    expect(isPatternName('toString')).toBe(false);
  });

  it.each(Object.entries(PATTERNS))(
    '%s renders values its own RegExp accepts',
    (_name, source) => {
      const generator = new PatternGenerator(source, { seed: 11 });
      const full = new RegExp(`^(?:${source})$`);
      for (const value of generator.renderMany(25)) {
        expect(value).toMatch(full);
      }
    }
  );

  it('is unaffected by the configured alphabet', () => {
    const plain = new PatternGenerator(PATTERNS.HEX_COLOR, { seed: 3 });
    const greek = new PatternGenerator(PATTERNS.HEX_COLOR, {
      seed: 3,
      alphabet: getAlphabet('greek'),
    });
    expect(greek.renderMany(5)).toEqual(plain.renderMany(5));
  });
});
