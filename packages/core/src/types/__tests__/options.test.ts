import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CONFIG,
  resolveGeneratorConfig,
  validateConfig,
} from '../options.js';
import { ConfigError, InvalidArgumentError } from '../errors.js';

describe('resolveGeneratorConfig', () => {
  it('falls back to the defaults', () => {
    expect(resolveGeneratorConfig()).toEqual({ maxRepeat: 100 });
    expect(DEFAULT_CONFIG.alphabet).toBeUndefined();
  });

  it('keeps default values for settings left undefined', () => {
    const defaults = { maxRepeat: 7, alphabet: 'xyz' };
    expect(resolveGeneratorConfig({}, defaults)).toEqual(defaults);
    expect(resolveGeneratorConfig({ maxRepeat: 3 }, defaults)).toEqual({
      maxRepeat: 3,
      alphabet: 'xyz',
    });
  });

  it('freezes the result', () => {
    expect(Object.isFrozen(resolveGeneratorConfig({ maxRepeat: 2 }))).toBe(
      true
    );
  });

  it('reports a bad repeat limit according to where it came from', () => {
    expect(() => resolveGeneratorConfig({ maxRepeat: 0 })).toThrow(
      InvalidArgumentError
    );
    expect(() =>
      resolveGeneratorConfig({ maxRepeat: 1.5 }, DEFAULT_CONFIG, 'configure')
    ).toThrow(ConfigError);
  });
});

describe('validateConfig', () => {
  it('rejects an empty alphabet', () => {
    expect(() => validateConfig({ alphabet: '' })).toThrow(
      'alphabet must not be empty'
    );
  });

  it('accepts valid settings', () => {
    expect(() => validateConfig({ maxRepeat: 1, alphabet: 'a' })).not.toThrow();
  });
});
