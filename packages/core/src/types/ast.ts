// =============================================================================
// PATTERN AST
// =============================================================================

/**
 * The six shorthand character categories (`\d \D \s \S \w \W`).
 * @public
 */
export type Category =
  | 'digit'
  | 'not-digit'
  | 'space'
  | 'not-space'
  | 'word'
  | 'not-word';

/**
 * Upper repetition bound of a quantifier. `'unbounded'` stands for `*`, `+`
 * and `{n,}`.
 * @public
 */
export type RepeatMax = number | 'unbounded';

/**
 * A parsed pattern, ready for the renderer, counter and enumerator.
 * @public
 */
export interface Pattern {
  /** Pattern text as accepted by the host RegExp engine */
  readonly source: string;

  /** Flags the pattern was compiled with */
  readonly flags: string;

  /** Top-level sequence */
  readonly nodes: readonly PatternNode[];

  /** Number of capturing groups */
  readonly groupCount: number;
}

/**
 * A node in the pattern AST, discriminated on `kind`.
 * @public
 */
export type PatternNode =
  | LiteralNode
  | NotLiteralNode
  | AnyNode
  | ClassNode
  | CategoryNode
  | BranchNode
  | GroupNode
  | AssertNode
  | AssertNotNode
  | BackrefNode
  | RepeatNode
  | AnchorNode
  | UnsupportedNode;

export type NodeKind = PatternNode['kind'];

/**
 * A single character, stored as a code point.
 * @public
 */
export interface LiteralNode {
  readonly kind: 'literal';
  readonly codePoint: number;
}

/**
 * Any printable character except one (`[^x]`).
 * @public
 */
export interface NotLiteralNode {
  readonly kind: 'not-literal';
  readonly codePoint: number;
}

/**
 * The `.` wildcard. `dotAll` is set when the pattern carries the `s` flag.
 * @public
 */
export interface AnyNode {
  readonly kind: 'any';
  readonly dotAll: boolean;
}

/**
 * A bracketed character class like `[a-z_\d]` or `[^abc]`.
 * @public
 */
export interface ClassNode {
  readonly kind: 'class';
  readonly negated: boolean;
  readonly items: readonly ClassItem[];
}

/**
 * A shorthand category outside of brackets, e.g. `\d`.
 * @public
 */
export interface CategoryNode {
  readonly kind: 'category';
  readonly category: Category;
}

/**
 * Alternation between sequences (`a|bc|d`).
 * @public
 */
export interface BranchNode {
  readonly kind: 'branch';
  readonly alternatives: readonly (readonly PatternNode[])[];
}

/**
 * A group. Capturing groups carry their 1-based index (and name, if any);
 * non-capturing groups have `index: null`.
 * @public
 */
export interface GroupNode {
  readonly kind: 'group';
  readonly index: number | null;
  readonly name: string | null;
  readonly body: readonly PatternNode[];
}

/**
 * Positive lookahead `(?=...)`.
 * @public
 */
export interface AssertNode {
  readonly kind: 'assert';
  readonly body: readonly PatternNode[];
}

/**
 * Negative lookahead `(?!...)`.
 * @public
 */
export interface AssertNotNode {
  readonly kind: 'assert-not';
  readonly body: readonly PatternNode[];
}

/**
 * Backreference to a capturing group, resolved to the group index.
 * @public
 */
export interface BackrefNode {
  readonly kind: 'backref';
  readonly index: number;
}

/**
 * A quantified body. `greedy` is false for lazy quantifiers (`*?`, `{2,4}?`).
 * `captures` lists the capturing groups inside `body`; each repetition
 * starts with them unbound.
 * @public
 */
export interface RepeatNode {
  readonly kind: 'repeat';
  readonly min: number;
  readonly max: RepeatMax;
  readonly greedy: boolean;
  readonly body: readonly PatternNode[];
  readonly captures: readonly number[];
}

/**
 * Zero-width position assertion.
 * @public
 */
export interface AnchorNode {
  readonly kind: 'anchor';
  readonly position: 'start' | 'end' | 'word-boundary' | 'not-word-boundary';
}

/**
 * A construct the parser recognised but no engine interprets
 * (lookbehind, `\p{...}`, set operations).
 * @public
 */
export interface UnsupportedNode {
  readonly kind: 'unsupported';
  readonly construct: string;
}

// =============================================================================
// CHARACTER CLASS ITEMS
// =============================================================================

/**
 * One entry inside a bracketed class.
 * @public
 */
export type ClassItem =
  | { readonly kind: 'literal'; readonly codePoint: number }
  | { readonly kind: 'range'; readonly from: number; readonly to: number }
  | { readonly kind: 'category'; readonly category: Category };
