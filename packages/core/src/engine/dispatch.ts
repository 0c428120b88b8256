import type { NodeKind, PatternNode } from '../types/ast.js';
import { UnsupportedConstructError } from '../types/errors.js';

export type NodeOf<K extends NodeKind> = Extract<PatternNode, { kind: K }>;

/**
 * One handler per AST node kind. Every engine provides the full table, so a
 * new node kind fails to compile until each engine handles it.
 */
export type NodeHandlers<R, C = void> = {
  readonly [K in NodeKind]: (node: NodeOf<K>, ctx: C) => R;
};

/**
 * Route `node` to the handler for its kind.
 * A kind with no handler (only possible for values built outside the parser)
 * raises UnsupportedConstructError.
 */
export function dispatchNode<R, C>(
  handlers: NodeHandlers<R, C>,
  node: PatternNode,
  ctx: C
): R {
  const kind: string = node.kind;
  switch (node.kind) {
    case 'literal':
      return handlers.literal(node, ctx);
    case 'not-literal':
      return handlers['not-literal'](node, ctx);
    case 'any':
      return handlers.any(node, ctx);
    case 'class':
      return handlers.class(node, ctx);
    case 'category':
      return handlers.category(node, ctx);
    case 'branch':
      return handlers.branch(node, ctx);
    case 'group':
      return handlers.group(node, ctx);
    case 'assert':
      return handlers.assert(node, ctx);
    case 'assert-not':
      return handlers['assert-not'](node, ctx);
    case 'backref':
      return handlers.backref(node, ctx);
    case 'repeat':
      return handlers.repeat(node, ctx);
    case 'anchor':
      return handlers.anchor(node, ctx);
    case 'unsupported':
      return handlers.unsupported(node, ctx);
    default:
      throw unsupportedConstruct(kind);
  }
}

export function unsupportedConstruct(
  construct: string,
  pattern?: string
): UnsupportedConstructError {
  return new UnsupportedConstructError({
    message: `Unsupported regex construct: ${construct}`,
    context: { construct, pattern },
    suggestions: [
      'Rewrite the pattern without lookbehind, unicode property escapes or class set operations',
    ],
  });
}
