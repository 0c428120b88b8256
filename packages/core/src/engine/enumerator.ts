import type { ClassResolver } from '../charset/class-resolver.js';
import type { Pattern, PatternNode, RepeatNode } from '../types/ast.js';
import { effectiveUpperBound } from './bounds.js';
import {
  dispatchNode,
  unsupportedConstruct,
  type NodeHandlers,
} from './dispatch.js';

export type Bindings = ReadonlyMap<number, string>;

/** Text produced so far, with the captures bound along the way */
export type Derivation = readonly [text: string, bindings: Bindings];

const NO_BINDINGS: Bindings = new Map();

function bind(bindings: Bindings, index: number, text: string): Bindings {
  const next = new Map(bindings);
  next.set(index, text);
  return next;
}

function unbind(bindings: Bindings, indices: readonly number[]): Bindings {
  if (!indices.some((index) => bindings.has(index))) return bindings;
  const next = new Map(bindings);
  for (const index of indices) next.delete(index);
  return next;
}

function* characters(
  chars: readonly string[],
  bindings: Bindings
): Generator<Derivation> {
  for (const ch of chars) yield [ch, bindings];
}

/**
 * Every combination of one derivation per part, leftmost part varying
 * slowest. Bindings flow left to right. Iterators are kept on an explicit
 * stack, so long sequences and high repetition counts add no generator
 * nesting.
 */
function* product<T>(
  parts: readonly T[],
  expand: (part: T, bindings: Bindings) => Iterator<Derivation>,
  bindings: Bindings
): Generator<Derivation> {
  const first = parts[0];
  if (first === undefined) {
    yield ['', bindings];
    return;
  }
  const iterators: Iterator<Derivation>[] = [expand(first, bindings)];
  const texts: string[] = [];
  for (;;) {
    const position = iterators.length - 1;
    const top = iterators[position];
    if (top === undefined) return;
    const result = top.next();
    if (result.done === true) {
      iterators.pop();
      texts.pop();
      continue;
    }
    const [text, after] = result.value;
    texts.push(text);
    const next = parts[position + 1];
    if (next === undefined) {
      yield [texts.join(''), after];
      texts.pop();
    } else {
      iterators.push(expand(next, after));
    }
  }
}

/**
 * Lazily walks every derivation of a pattern in a fixed order: class members
 * in resolver order, alternatives left to right, repetitions from fewest to
 * most. Each derivation carries its own capture snapshot, so backreferences
 * see the text bound on that path only.
 */
export class Enumerator {
  private readonly handlers: NodeHandlers<Generator<Derivation>, Bindings>;

  constructor(
    private readonly pattern: Pattern,
    resolver: ClassResolver,
    private readonly limit: number
  ) {
    const sequence = this.sequence.bind(this);
    this.handlers = {
      *literal(node, bindings) {
        yield [String.fromCodePoint(node.codePoint), bindings];
      },
      'not-literal': (node, bindings) =>
        characters(resolver.notLiteral(node), bindings),
      any: (node, bindings) => characters(resolver.any(node.dotAll), bindings),
      class: (node, bindings) => characters(resolver.resolve(node), bindings),
      category: (node, bindings) =>
        characters(resolver.category(node.category), bindings),
      *branch(node, bindings) {
        for (const alternative of node.alternatives) {
          yield* sequence(alternative, bindings);
        }
      },
      *group(node, bindings) {
        for (const [text, next] of sequence(node.body, bindings)) {
          yield [
            text,
            node.index === null ? next : bind(next, node.index, text),
          ];
        }
      },
      *assert(node, bindings) {
        for (const [, next] of sequence(node.body, bindings)) {
          yield ['', next];
        }
      },
      *'assert-not'(_node, bindings) {
        yield ['', bindings];
      },
      *backref(node, bindings) {
        yield [bindings.get(node.index) ?? '', bindings];
      },
      repeat: (node, bindings) =>
        this.repeat(node, effectiveUpperBound(node, this.limit), bindings),
      *anchor(_node, bindings) {
        yield ['', bindings];
      },
      unsupported: (node) => {
        throw unsupportedConstruct(node.construct, pattern.source);
      },
    };
  }

  *strings(): Generator<string> {
    for (const [text] of this.sequence(this.pattern.nodes, NO_BINDINGS)) {
      yield text;
    }
  }

  private sequence(
    nodes: readonly PatternNode[],
    bindings: Bindings
  ): Generator<Derivation> {
    return product(
      nodes,
      (node, before) => dispatchNode(this.handlers, node, before),
      bindings
    );
  }

  // Each repetition starts with the body's groups unbound.
  private *repeat(
    node: RepeatNode,
    max: number,
    bindings: Bindings
  ): Generator<Derivation> {
    for (let times = node.min; times <= max; times++) {
      const iterations = Array.from({ length: times }, () => node.body);
      yield* product(
        iterations,
        (body, before) => this.sequence(body, unbind(before, node.captures)),
        bindings
      );
    }
  }
}
