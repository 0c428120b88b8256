/**
 * Pattern parser bridge
 *
 * The host RegExp engine decides whether a pattern is valid; regexpp provides
 * the syntax tree, which is lowered here into the immutable Pattern AST the
 * engines interpret.
 */

import {
  RegExpParser,
  visitRegExpAST,
  type AST,
} from '@eslint-community/regexpp';
import type {
  Category,
  ClassItem,
  Pattern,
  PatternNode,
} from '../types/ast.js';
import { PatternError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

interface GroupIndex {
  readonly byNode: ReadonlyMap<AST.CapturingGroup, number>;
  readonly byName: ReadonlyMap<string, number>;
}

interface LoweringContext {
  readonly groups: GroupIndex;
  readonly dotAll: boolean;
}

const parser = new RegExpParser({ ecmaVersion: 2024 });

/**
 * Parse `source` with `flags` into a Pattern.
 * Syntax the host engine rejects comes back as an Err carrying a PatternError.
 */
export function parsePattern(
  source: string,
  flags = ''
): Result<Pattern, PatternError> {
  try {
    new RegExp(source, flags);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return err(syntaxError(source, flags, error));
    }
    throw error;
  }

  let tree: AST.Pattern;
  try {
    tree = parser.parsePattern(source, 0, source.length, {
      unicode: flags.includes('u'),
      unicodeSets: flags.includes('v'),
    });
  } catch (error) {
    if (error instanceof SyntaxError) {
      return err(syntaxError(source, flags, error));
    }
    throw error;
  }

  const groups = indexGroups(tree);
  const ctx: LoweringContext = { groups, dotAll: flags.includes('s') };

  return ok(
    Object.freeze({
      source,
      flags,
      nodes: lowerAlternatives(tree.alternatives, ctx),
      groupCount: groups.byNode.size,
    })
  );
}

function syntaxError(
  source: string,
  flags: string,
  cause: SyntaxError
): PatternError {
  return new PatternError({
    message: `Invalid pattern /${source}/${flags}: ${cause.message}`,
    context: { pattern: source, value: flags },
    cause,
    suggestions: ['Check the pattern with new RegExp(pattern, flags)'],
  });
}

// Capturing groups are numbered by the position of their opening parenthesis,
// which is the preorder in which regexpp visits them.
function indexGroups(tree: AST.Pattern): GroupIndex {
  const byNode = new Map<AST.CapturingGroup, number>();
  const byName = new Map<string, number>();
  visitRegExpAST(tree, {
    onCapturingGroupEnter(group) {
      const index = byNode.size + 1;
      byNode.set(group, index);
      if (group.name !== null && !byName.has(group.name)) {
        byName.set(group.name, index);
      }
    },
  });
  return { byNode, byName };
}

function freezeNode<T extends PatternNode>(node: T): T {
  return Object.freeze(node);
}

function lowerAlternatives(
  alternatives: readonly AST.Alternative[],
  ctx: LoweringContext
): readonly PatternNode[] {
  const [only, ...rest] = alternatives;
  if (only !== undefined && rest.length === 0) {
    return lowerSequence(only.elements, ctx);
  }
  return Object.freeze([
    freezeNode({
      kind: 'branch',
      alternatives: Object.freeze(
        alternatives.map((alt) => lowerSequence(alt.elements, ctx))
      ),
    }),
  ]);
}

function lowerSequence(
  elements: readonly AST.Element[],
  ctx: LoweringContext
): readonly PatternNode[] {
  return Object.freeze(elements.map((element) => lowerElement(element, ctx)));
}

function unsupported(construct: string): PatternNode {
  return freezeNode({ kind: 'unsupported', construct });
}

function lowerElement(
  element: AST.Element | AST.QuantifiableElement,
  ctx: LoweringContext
): PatternNode {
  const type: string = element.type;
  switch (element.type) {
    case 'Character':
      return freezeNode({ kind: 'literal', codePoint: element.value });
    case 'CharacterSet':
      return lowerCharacterSet(element, ctx);
    case 'CharacterClass':
      return lowerCharacterClass(element);
    case 'Group':
      return freezeNode({
        kind: 'group',
        index: null,
        name: null,
        body: lowerAlternatives(element.alternatives, ctx),
      });
    case 'CapturingGroup':
      return freezeNode({
        kind: 'group',
        index: ctx.groups.byNode.get(element) ?? null,
        name: element.name,
        body: lowerAlternatives(element.alternatives, ctx),
      });
    case 'Quantifier': {
      const body = Object.freeze([lowerElement(element.element, ctx)]);
      return freezeNode({
        kind: 'repeat',
        min: element.min,
        max: Number.isFinite(element.max) ? element.max : 'unbounded',
        greedy: element.greedy,
        body,
        captures: Object.freeze(captureIndices(body)),
      });
    }
    case 'Backreference':
      return lowerBackreference(element.ref, ctx);
    case 'Assertion':
      return lowerAssertion(element, ctx);
    case 'ExpressionCharacterClass':
      return unsupported('class set operation');
    default:
      return unsupported(type);
  }
}

function captureIndices(nodes: readonly PatternNode[]): number[] {
  const found: number[] = [];
  const pending = [...nodes];
  for (let node = pending.pop(); node !== undefined; node = pending.pop()) {
    switch (node.kind) {
      case 'group':
        if (node.index !== null) found.push(node.index);
        pending.push(...node.body);
        break;
      case 'branch':
        for (const alternative of node.alternatives) {
          pending.push(...alternative);
        }
        break;
      case 'assert':
      case 'assert-not':
      case 'repeat':
        pending.push(...node.body);
        break;
      default:
        break;
    }
  }
  return found.sort((a, b) => a - b);
}

function lowerBackreference(
  ref: number | string,
  ctx: LoweringContext
): PatternNode {
  const index = typeof ref === 'number' ? ref : ctx.groups.byName.get(ref);
  if (index === undefined) return unsupported(`backreference \\k<${ref}>`);
  return freezeNode({ kind: 'backref', index });
}

function lowerAssertion(
  assertion: AST.Assertion,
  ctx: LoweringContext
): PatternNode {
  switch (assertion.kind) {
    case 'start':
      return freezeNode({ kind: 'anchor', position: 'start' });
    case 'end':
      return freezeNode({ kind: 'anchor', position: 'end' });
    case 'word':
      return freezeNode({
        kind: 'anchor',
        position: assertion.negate ? 'not-word-boundary' : 'word-boundary',
      });
    case 'lookahead': {
      const body = lowerAlternatives(assertion.alternatives, ctx);
      return assertion.negate
        ? freezeNode({ kind: 'assert-not', body })
        : freezeNode({ kind: 'assert', body });
    }
    case 'lookbehind':
      return unsupported(
        assertion.negate ? 'negative lookbehind' : 'lookbehind'
      );
  }
}

function escapeCategory(
  kind: 'digit' | 'space' | 'word',
  negate: boolean
): Category {
  if (!negate) return kind;
  switch (kind) {
    case 'digit':
      return 'not-digit';
    case 'space':
      return 'not-space';
    case 'word':
      return 'not-word';
  }
}

function lowerCharacterSet(
  set: AST.CharacterSet,
  ctx: LoweringContext
): PatternNode {
  switch (set.kind) {
    case 'any':
      return freezeNode({ kind: 'any', dotAll: ctx.dotAll });
    case 'digit':
    case 'space':
    case 'word':
      return freezeNode({
        kind: 'category',
        category: escapeCategory(set.kind, set.negate),
      });
    case 'property':
      return unsupported('unicode property escape');
  }
}

function lowerCharacterClass(cls: AST.CharacterClass): PatternNode {
  const [first, ...others] = cls.elements;
  if (cls.negate && first?.type === 'Character' && others.length === 0) {
    return freezeNode({ kind: 'not-literal', codePoint: first.value });
  }

  const items: ClassItem[] = [];
  for (const element of cls.elements) {
    switch (element.type) {
      case 'Character':
        items.push(
          Object.freeze({ kind: 'literal', codePoint: element.value })
        );
        break;
      case 'CharacterClassRange':
        items.push(
          Object.freeze({
            kind: 'range',
            from: element.min.value,
            to: element.max.value,
          })
        );
        break;
      case 'CharacterSet':
        if (element.kind === 'property') {
          return unsupported('unicode property escape');
        }
        items.push(
          Object.freeze({
            kind: 'category',
            category: escapeCategory(element.kind, element.negate),
          })
        );
        break;
      default:
        return unsupported('class set operation');
    }
  }

  return freezeNode({
    kind: 'class',
    negated: cls.negate,
    items: Object.freeze(items),
  });
}
