import { describe, it, expect } from 'vitest';
import {
  INFINITE,
  ONE,
  ZERO,
  add,
  compare,
  exceeds,
  finite,
  formatCardinality,
  isInfinite,
  isZero,
  multiply,
  powerSum,
  toNumber,
} from '../cardinality.js';

describe('cardinality arithmetic', () => {
  it('adds and multiplies finite counts in bigint', () => {
    expect(add(finite(2), finite(3))).toEqual(finite(5));
    expect(multiply(finite(2 ** 40), finite(2 ** 40))).toEqual(finite(2n ** 80n));
  });

  it('lets infinity win over addition and multiplication', () => {
    expect(add(ONE, INFINITE)).toBe(INFINITE);
    expect(multiply(finite(3), INFINITE)).toBe(INFINITE);
  });

  it('lets zero absorb infinity in products', () => {
    expect(multiply(ZERO, INFINITE)).toBe(ZERO);
    expect(multiply(INFINITE, ZERO)).toBe(ZERO);
  });

  it('rejects negative counts', () => {
    expect(() => finite(-1)).toThrow(RangeError);
  });

  it('sums powers with 0^0 = 1', () => {
    expect(powerSum(2n, 2, 3)).toBe(12n);
    expect(powerSum(0n, 0, 2)).toBe(1n);
    expect(powerSum(0n, 1, 2)).toBe(0n);
    expect(powerSum(5n, 0, 0)).toBe(1n);
  });

  it('compares and formats counts', () => {
    expect(compare(finite(1), finite(2))).toBe(-1);
    expect(compare(finite(2), finite(2))).toBe(0);
    expect(compare(INFINITE, finite(2))).toBe(1);
    expect(compare(INFINITE, INFINITE)).toBe(0);
    expect(exceeds(finite(3), 2)).toBe(true);
    expect(exceeds(finite(3), 3)).toBe(false);
    expect(exceeds(INFINITE, 10n ** 30n)).toBe(true);
    expect(formatCardinality(finite(12))).toBe('12');
    expect(formatCardinality(INFINITE)).toBe('infinite');
  });

  it('narrows and converts', () => {
    expect(isInfinite(INFINITE)).toBe(true);
    expect(isZero(ZERO)).toBe(true);
    expect(isZero(ONE)).toBe(false);
    expect(toNumber(finite(10))).toBe(10);
    expect(toNumber(finite(2n ** 60n))).toBe(Number.POSITIVE_INFINITY);
    expect(toNumber(INFINITE)).toBe(Number.POSITIVE_INFINITY);
  });
});
