import { describe, it, expect } from 'vitest';
import { Renderer } from '../renderer.js';
import { ClassResolver } from '../../charset/class-resolver.js';
import { getCategoryTable } from '../../charset/categories.js';
import { parsePattern } from '../../parser/pattern-parser.js';
import { isErr } from '../../types/result.js';
import {
  GenerationError,
  UnsupportedConstructError,
} from '../../types/errors.js';
import { XorShift32 } from '../../util/rng.js';

function renderer(
  source: string,
  options: { seed?: number; maxRepeat?: number; alphabet?: string } = {}
): Renderer {
  const parsed = parsePattern(source);
  if (isErr(parsed)) throw parsed.error;
  return new Renderer(parsed.value, {
    resolver: new ClassResolver(getCategoryTable(options.alphabet)),
    rng: new XorShift32(options.seed ?? 1, source),
    maxRepeat: options.maxRepeat ?? 100,
  });
}

function renderAll(r: Renderer, n: number): string[] {
  return Array.from({ length: n }, () => r.render());
}

describe('Renderer', () => {
  it('renders values that match the pattern', () => {
    const r = renderer('[abc]{5}-\\d{2}');
    for (const value of renderAll(r, 200)) {
      expect(value).toMatch(/^[abc]{5}-\d{2}$/);
    }
  });

  it('is reproducible for a fixed seed', () => {
    const first = renderAll(renderer('[a-z]{8}', { seed: 42 }), 20);
    const second = renderAll(renderer('[a-z]{8}', { seed: 42 }), 20);
    expect(second).toEqual(first);
  });

  it('keeps repetition counts within the quantifier bounds', () => {
    const lengths = new Set(
      renderAll(renderer('a{2,4}'), 300).map((v) => v.length)
    );
    expect([...lengths].sort()).toEqual([2, 3, 4]);
  });

  it('caps open-ended quantifiers at maxRepeat', () => {
    for (const value of renderAll(renderer('a*', { maxRepeat: 3 }), 200)) {
      expect(value.length).toBeLessThanOrEqual(3);
    }
  });

  it('repeats the captured text for backreferences', () => {
    for (const value of renderAll(renderer('(\\d)\\1'), 100)) {
      expect(value).toMatch(/^(\d)\1$/);
    }
  });

  it('clears captures between renders', () => {
    const values = new Set(renderAll(renderer('(?:(a)|b)\\1'), 200));
    expect([...values].sort()).toEqual(['aa', 'b']);
  });

  it('unsets the groups of a repetition before it runs again', () => {
    const values = new Set(renderAll(renderer('(?:(a)|b){2}\\1'), 200));
    expect([...values].sort()).toEqual(['aaa', 'ab', 'baa', 'bb']);
  });

  it('discards lookahead text but keeps its captures', () => {
    expect(renderer('(?=(a))\\1b').render()).toBe('ab');
    expect(renderer('^a(?!b)$').render()).toBe('a');
  });

  it('uses the configured alphabet for word characters', () => {
    for (const value of renderAll(renderer('\\w{4}', { alphabet: 'xy' }), 50)) {
      expect(value).toMatch(/^[xy0-9_]{4}$/);
    }
  });

  it('fails on a class that matches no printable character', () => {
    expect(() => renderer('[^\\s\\S]').render()).toThrow(GenerationError);
  });

  it('throws for unsupported constructs', () => {
    expect(() => renderer('(?<=a)b').render()).toThrow(
      UnsupportedConstructError
    );
  });
});
