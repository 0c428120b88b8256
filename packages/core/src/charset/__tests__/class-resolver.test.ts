import { describe, it, expect } from 'vitest';
import { getCategoryTable } from '../categories.js';
import {
  ClassResolver,
  printableExcept,
  resolveClass,
} from '../class-resolver.js';
import type { ClassNode } from '../../types/ast.js';

const table = getCategoryTable();

function cls(negated: boolean, items: ClassNode['items']): ClassNode {
  return { kind: 'class', negated, items };
}

describe('resolveClass', () => {
  it('collects literals, ranges and categories sorted by code point', () => {
    const node = cls(false, [
      { kind: 'literal', codePoint: 0x7a },
      { kind: 'range', from: 0x61, to: 0x63 },
      { kind: 'category', category: 'digit' },
    ]);
    expect(resolveClass(node, table).join('')).toBe('0123456789abcz');
  });

  it('removes duplicates from overlapping items', () => {
    const node = cls(false, [
      { kind: 'range', from: 0x61, to: 0x63 },
      { kind: 'literal', codePoint: 0x62 },
    ]);
    expect(resolveClass(node, table)).toEqual(['a', 'b', 'c']);
  });

  it('resolves a negated class against the printable universe', () => {
    const node = cls(true, [{ kind: 'range', from: 0x61, to: 0x7a }]);
    const chars = resolveClass(node, table);
    expect(chars).toHaveLength(74);
    expect(chars[0]).toBe('\t');
    expect(chars).not.toContain('m');
    expect(chars).toContain('M');
  });

  it('resolves a class that matches nothing to an empty list', () => {
    const node = cls(true, [
      { kind: 'category', category: 'space' },
      { kind: 'category', category: 'not-space' },
    ]);
    expect(resolveClass(node, table)).toEqual([]);
  });
});

describe('printableExcept', () => {
  it('keeps printable order', () => {
    const chars = printableExcept(table, ['a']);
    expect(chars).toHaveLength(99);
    expect(chars[0]).toBe('b');
  });
});

describe('ClassResolver', () => {
  const resolver = new ClassResolver(table);

  it('excludes line terminators from the wildcard unless dotAll', () => {
    expect(resolver.any(false)).toHaveLength(98);
    expect(resolver.any(false)).not.toContain('\n');
    expect(resolver.any(false)).not.toContain('\r');
    expect(resolver.any(true)).toHaveLength(100);
  });

  it('resolves a negated single character', () => {
    const chars = resolver.notLiteral({ codePoint: 0x61 });
    expect(chars).toHaveLength(99);
    expect(chars).not.toContain('a');
  });

  it('caches by node identity', () => {
    const node = cls(false, [{ kind: 'range', from: 0x30, to: 0x39 }]);
    expect(resolver.resolve(node)).toBe(resolver.resolve(node));
    expect(resolver.category('word')).toBe(resolver.category('word'));
  });

  it('resolves a shorthand category like a class holding it', () => {
    const word = resolver.category('word');
    expect(word).toEqual(
      resolveClass(cls(false, [{ kind: 'category', category: 'word' }]), table)
    );
    expect(word.slice(0, 11).join('')).toBe('0123456789A');
    expect(word[36]).toBe('_');
    expect(word.at(-1)).toBe('z');
  });

  it('leaves out both cases of an excluded letter when ignoring case', () => {
    const folding = new ClassResolver(table, true);
    const notA = folding.notLiteral({ codePoint: 0x61 });
    expect(notA).toHaveLength(98);
    expect(notA).not.toContain('a');
    expect(notA).not.toContain('A');

    const notRange = folding.resolve(
      cls(true, [{ kind: 'range', from: 0x41, to: 0x43 }])
    );
    expect(notRange).toHaveLength(94);
    expect(notRange).not.toContain('b');
    expect(notRange).toContain('d');
  });
});
