import type { ClassResolver } from '../charset/class-resolver.js';
import type { Pattern, PatternNode } from '../types/ast.js';
import { GenerationError } from '../types/errors.js';
import type { XorShift32 } from '../util/rng.js';
import { effectiveUpperBound } from './bounds.js';
import {
  dispatchNode,
  unsupportedConstruct,
  type NodeHandlers,
} from './dispatch.js';

export interface RendererOptions {
  resolver: ClassResolver;
  rng: XorShift32;
  /** Repetition cap for open-ended quantifiers */
  maxRepeat: number;
}

/**
 * Produces one random match of a pattern per call.
 *
 * Capture bindings live on the instance for the duration of one render and
 * are cleared afterwards, so renders never see each other's groups.
 */
export class Renderer {
  private readonly captures = new Map<number, string>();
  private readonly handlers: NodeHandlers<string>;

  constructor(
    private readonly pattern: Pattern,
    private readonly options: RendererOptions
  ) {
    const { resolver, rng } = options;
    this.handlers = {
      literal: (node) => String.fromCodePoint(node.codePoint),
      'not-literal': (node) =>
        this.pick(resolver.notLiteral(node), 'negated literal'),
      any: (node) => this.pick(resolver.any(node.dotAll), 'wildcard'),
      class: (node) => this.pick(resolver.resolve(node), 'character class'),
      category: (node) =>
        this.pick(
          resolver.category(node.category),
          `category ${node.category}`
        ),
      branch: (node) => this.sequence(rng.pick(node.alternatives)),
      group: (node) => {
        const text = this.sequence(node.body);
        if (node.index !== null) this.captures.set(node.index, text);
        return text;
      },
      // Lookahead text is discarded; its groups stay bound.
      assert: (node) => {
        this.sequence(node.body);
        return '';
      },
      'assert-not': () => '',
      backref: (node) => this.captures.get(node.index) ?? '',
      repeat: (node) => {
        const upper = effectiveUpperBound(node, this.options.maxRepeat);
        const times = rng.nextInt(node.min, upper);
        let out = '';
        for (let i = 0; i < times; i++) {
          for (const index of node.captures) this.captures.delete(index);
          out += this.sequence(node.body);
        }
        return out;
      },
      anchor: () => '',
      unsupported: (node) => {
        throw unsupportedConstruct(node.construct, this.pattern.source);
      },
    };
  }

  render(): string {
    try {
      return this.sequence(this.pattern.nodes);
    } finally {
      this.captures.clear();
    }
  }

  private sequence(nodes: readonly PatternNode[]): string {
    let out = '';
    for (const node of nodes) {
      out += dispatchNode(this.handlers, node, undefined);
    }
    return out;
  }

  private pick(chars: readonly string[], what: string): string {
    if (chars.length === 0) {
      throw new GenerationError({
        message: `The ${what} in /${this.pattern.source}/ matches no printable character`,
        context: { pattern: this.pattern.source, construct: what },
        suggestions: ['Widen the class or configure a larger alphabet'],
      });
    }
    return this.options.rng.pick(chars);
  }
}
