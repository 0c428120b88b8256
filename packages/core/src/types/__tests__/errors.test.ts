import { describe, it, expect } from 'vitest';
import {
  CapacityError,
  ConfigError,
  GenerationError,
  InvalidArgumentError,
  IterationLimitError,
  PatternError,
  RegexForgeError,
  UnsupportedConstructError,
  isRegexForgeError,
} from '../errors.js';
import { ErrorCode } from '../../errors/codes.js';

describe('error hierarchy', () => {
  it('assigns each class its default code and exit status', () => {
    const cases: Array<[RegexForgeError, ErrorCode, number]> = [
      [new PatternError({ message: 'x' }), ErrorCode.PATTERN_SYNTAX, 60],
      [new ConfigError({ message: 'x' }), ErrorCode.CONFIGURATION_ERROR, 50],
      [
        new InvalidArgumentError({ message: 'x' }),
        ErrorCode.INVALID_ARGUMENT,
        51,
      ],
      [
        new UnsupportedConstructError({
          message: 'x',
          context: { construct: 'lookbehind' },
        }),
        ErrorCode.UNSUPPORTED_CONSTRUCT,
        11,
      ],
      [new GenerationError({ message: 'x' }), ErrorCode.GENERATION_FAILED, 30],
      [new CapacityError({ message: 'x' }), ErrorCode.CAPACITY_EXCEEDED, 31],
      [
        new IterationLimitError({ message: 'x' }),
        ErrorCode.ITERATION_LIMIT,
        32,
      ],
    ];
    for (const [error, code, exit] of cases) {
      expect(error.errorCode).toBe(code);
      expect(error.getExitCode()).toBe(exit);
      expect(error.severity).toBe('error');
      expect(isRegexForgeError(error)).toBe(true);
      expect(error).toBeInstanceOf(Error);
    }
  });

  it('names errors after their class', () => {
    expect(new CapacityError({ message: 'x' }).name).toBe('CapacityError');
  });

  it('exposes typed context accessors', () => {
    expect(
      new PatternError({ message: 'x', context: { pattern: '(' } }).pattern
    ).toBe('(');
    expect(
      new ConfigError({ message: 'x', context: { setting: 'alphabet' } })
        .setting
    ).toBe('alphabet');
    expect(
      new UnsupportedConstructError({
        message: 'x',
        context: { construct: 'set operation' },
      }).construct
    ).toBe('set operation');
    expect(
      new IterationLimitError({ message: 'x', context: { limit: 10 } }).limit
    ).toBe(10);
  });

  it('keeps the cause in the serialized form', () => {
    const cause = new SyntaxError('Unterminated group');
    const error = new PatternError({ message: 'Invalid pattern', cause });
    expect(error.cause).toBe(cause);
    expect(error.toJSON('prod').cause).toEqual({
      name: 'SyntaxError',
      message: 'Unterminated group',
    });
  });

  it('rejects plain errors', () => {
    expect(isRegexForgeError(new Error('x'))).toBe(false);
    expect(isRegexForgeError('x')).toBe(false);
  });
});
