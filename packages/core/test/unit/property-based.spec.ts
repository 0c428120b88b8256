import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import { PatternGenerator } from '../../src/index.js';
import {
  ENUMERATION_CAP,
  boundedPatternArbitrary,
  repeatedCaptureArbitrary,
  seedArbitrary,
} from '../fixtures/patterns.js';

function fullMatch(source: string): RegExp {
  return new RegExp(`^(?:${source})$`);
}

describe('PatternGenerator properties', () => {
  it('renders the same values for the same seed', () => {
    const property = fc.property(
      boundedPatternArbitrary,
      seedArbitrary,
      (source, seed) => {
        const first = new PatternGenerator(source, { seed }).renderMany(5);
        const second = new PatternGenerator(source, { seed }).renderMany(5);
        expect(second).toEqual(first);
      }
    );
    fc.assert(property, { seed: 202_610, numRuns: 100 });
  });

  it('renders values the host RegExp accepts', () => {
    const property = fc.property(
      boundedPatternArbitrary,
      seedArbitrary,
      (source, seed) => {
        const full = fullMatch(source);
        const generator = new PatternGenerator(source, { seed });
        for (const value of generator.renderMany(10)) {
          expect(value).toMatch(full);
        }
      }
    );
    fc.assert(property, { seed: 202_611, numRuns: 100 });
  });

  it('enumerates exactly count derivations, each a match', () => {
    const property = fc.property(boundedPatternArbitrary, (source) => {
      const generator = new PatternGenerator(source);
      const count = generator.count();
      if (count.kind !== 'finite') {
        throw new Error(`/${source}/ should have a finite count`);
      }
      fc.pre(count.value <= ENUMERATION_CAP);

      const values = Array.from(generator.enumerate());
      expect(BigInt(values.length)).toBe(count.value);
      const full = fullMatch(source);
      for (const value of values) expect(value).toMatch(full);
    });
    fc.assert(property, { seed: 202_612, numRuns: 100 });
  });

  it('only renders values the enumeration contains', () => {
    const property = fc.property(
      boundedPatternArbitrary,
      seedArbitrary,
      (source, seed) => {
        const generator = new PatternGenerator(source, { seed });
        const count = generator.count();
        fc.pre(count.kind === 'finite' && count.value <= ENUMERATION_CAP);

        const all = new Set(generator.enumerate());
        for (const value of generator.renderMany(10)) {
          expect(all.has(value)).toBe(true);
        }
      }
    );
    fc.assert(property, { seed: 202_613, numRuns: 100 });
  });

  it('unsets captures at the start of every repetition', () => {
    const property = fc.property(
      repeatedCaptureArbitrary,
      seedArbitrary,
      (source, seed) => {
        const full = fullMatch(source);
        const generator = new PatternGenerator(source, { seed });
        for (const value of generator.renderMany(20)) {
          expect(value).toMatch(full);
        }
        for (const value of generator.enumerate()) {
          expect(value).toMatch(full);
        }
      }
    );
    fc.assert(property, { seed: 202_614, numRuns: 100 });
  });
});
