import type { Category, ClassItem, ClassNode } from '../types/ast.js';
import type { CategoryTable } from './categories.js';

// Characters `.` never matches unless the pattern has the `s` flag
export const LINE_TERMINATORS: readonly string[] = ['\n', '\r'];

function byCodePoint(a: string, b: string): number {
  return (a.codePointAt(0) ?? 0) - (b.codePointAt(0) ?? 0);
}

function collectItem(
  item: ClassItem,
  table: CategoryTable,
  into: Set<string>
): void {
  switch (item.kind) {
    case 'literal':
      into.add(String.fromCodePoint(item.codePoint));
      return;
    case 'range':
      for (let cp = item.from; cp <= item.to; cp++) {
        into.add(String.fromCodePoint(cp));
      }
      return;
    case 'category':
      for (const ch of table.categories[item.category]) into.add(ch);
      return;
  }
}

// Both case forms of `ch`, as the `i` flag matches them
function caseVariants(ch: string): string[] {
  return [ch, ch.toLowerCase(), ch.toUpperCase()];
}

/**
 * Concrete characters matched by a bracketed class, sorted by code point.
 * A negated class resolves against the printable universe of `table`; with
 * `ignoreCase` it also leaves out the other case of every excluded letter.
 */
export function resolveClass(
  node: Pick<ClassNode, 'negated' | 'items'>,
  table: CategoryTable,
  ignoreCase = false
): string[] {
  const chars = new Set<string>();
  for (const item of node.items) collectItem(item, table, chars);

  const resolved = node.negated
    ? printableExcept(table, Array.from(chars), ignoreCase)
    : Array.from(chars);
  return resolved.sort(byCodePoint);
}

/**
 * Printable characters minus `excluded`, in printable order.
 */
export function printableExcept(
  table: CategoryTable,
  excluded: readonly string[],
  ignoreCase = false
): string[] {
  const drop = new Set(ignoreCase ? excluded.flatMap(caseVariants) : excluded);
  return table.printable.filter(
    (ch) =>
      !(ignoreCase ? caseVariants(ch) : [ch]).some((form) => drop.has(form))
  );
}

/**
 * Memoizes resolved character lists per AST node for one category table.
 * AST nodes are immutable, so identity is a safe key. `ignoreCase` mirrors
 * the pattern's `i` flag.
 */
export class ClassResolver {
  private readonly cache = new WeakMap<object, readonly string[]>();
  private readonly categories = new Map<Category, readonly string[]>();
  private anyChars?: readonly string[];
  private anyDotAll?: readonly string[];

  constructor(
    readonly table: CategoryTable,
    readonly ignoreCase = false
  ) {}

  resolve(node: ClassNode): readonly string[] {
    let chars = this.cache.get(node);
    if (!chars) {
      chars = Object.freeze(resolveClass(node, this.table, this.ignoreCase));
      this.cache.set(node, chars);
    }
    return chars;
  }

  notLiteral(node: { readonly codePoint: number }): readonly string[] {
    let chars = this.cache.get(node);
    if (!chars) {
      chars = Object.freeze(
        printableExcept(
          this.table,
          [String.fromCodePoint(node.codePoint)],
          this.ignoreCase
        )
      );
      this.cache.set(node, chars);
    }
    return chars;
  }

  any(dotAll: boolean): readonly string[] {
    if (dotAll) {
      this.anyDotAll ??= this.table.printable;
      return this.anyDotAll;
    }
    this.anyChars ??= Object.freeze(
      printableExcept(this.table, LINE_TERMINATORS)
    );
    return this.anyChars;
  }

  /** A shorthand resolves like a class holding only that category. */
  category(category: Category): readonly string[] {
    let chars = this.categories.get(category);
    if (!chars) {
      chars = Object.freeze(
        resolveClass(
          { negated: false, items: [{ kind: 'category', category }] },
          this.table
        )
      );
      this.categories.set(category, chars);
    }
    return chars;
  }
}
