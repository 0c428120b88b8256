import type { ClassResolver } from '../charset/class-resolver.js';
import type { Pattern, PatternNode } from '../types/ast.js';
import {
  INFINITE,
  ONE,
  ZERO,
  add,
  finite,
  multiply,
  powerSum,
  type Cardinality,
} from '../util/cardinality.js';
import {
  dispatchNode,
  unsupportedConstruct,
  type NodeHandlers,
} from './dispatch.js';

/**
 * Exact number of derivations of a pattern.
 *
 * Quantifiers without an upper bound make the count infinite regardless of
 * the repeat cap; finite quantifiers are summed in bigint arithmetic.
 */
export class Counter {
  private readonly handlers: NodeHandlers<Cardinality>;

  constructor(
    private readonly pattern: Pattern,
    resolver: ClassResolver
  ) {
    this.handlers = {
      literal: () => ONE,
      'not-literal': (node) => finite(resolver.notLiteral(node).length),
      any: (node) => finite(resolver.any(node.dotAll).length),
      class: (node) => finite(resolver.resolve(node).length),
      category: (node) => finite(resolver.category(node.category).length),
      branch: (node) =>
        node.alternatives.reduce<Cardinality>(
          (total, alt) => add(total, this.sequence(alt)),
          ZERO
        ),
      group: (node) => this.sequence(node.body),
      assert: (node) => this.sequence(node.body),
      'assert-not': () => ONE,
      backref: () => ONE,
      repeat: (node) => {
        if (node.max === 'unbounded') return INFINITE;
        const inner = this.sequence(node.body);
        if (inner.kind === 'infinite') {
          return node.max === 0 ? ONE : INFINITE;
        }
        return finite(powerSum(inner.value, node.min, node.max));
      },
      anchor: () => ONE,
      unsupported: (node) => {
        throw unsupportedConstruct(node.construct, this.pattern.source);
      },
    };
  }

  count(): Cardinality {
    return this.sequence(this.pattern.nodes);
  }

  private sequence(nodes: readonly PatternNode[]): Cardinality {
    let product = ONE;
    for (const node of nodes) {
      product = multiply(product, dispatchNode(this.handlers, node, undefined));
    }
    return product;
  }
}
