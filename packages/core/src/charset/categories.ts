import type { Category } from '../types/ast.js';

export const ASCII_LOWERCASE = 'abcdefghijklmnopqrstuvwxyz';
export const ASCII_UPPERCASE = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
export const ASCII_LETTERS = ASCII_LOWERCASE + ASCII_UPPERCASE;
export const DIGITS = '0123456789';
export const PUNCTUATION = '!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~';
export const WHITESPACE = ' \t\n\r\u000b\u000c';

export const CATEGORIES: readonly Category[] = [
  'digit',
  'not-digit',
  'space',
  'not-space',
  'word',
  'not-word',
];

/**
 * Character universe derived from one base alphabet.
 * All character lists are deduplicated and keep first-seen order.
 */
export interface CategoryTable {
  readonly alphabet: string;
  /** word ∪ punctuation ∪ whitespace */
  readonly printable: readonly string[];
  readonly categories: Readonly<Record<Category, readonly string[]>>;
}

function uniqueChars(...parts: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const part of parts) {
    for (const ch of part) {
      if (!seen.has(ch)) {
        seen.add(ch);
        out.push(ch);
      }
    }
  }
  return out;
}

function without(
  universe: readonly string[],
  excluded: readonly string[]
): string[] {
  const drop = new Set(excluded);
  return universe.filter((ch) => !drop.has(ch));
}

function freezeTable(table: CategoryTable): CategoryTable {
  Object.freeze(table.printable);
  for (const chars of Object.values(table.categories)) Object.freeze(chars);
  Object.freeze(table.categories);
  return Object.freeze(table);
}

/**
 * Build the six categories and the printable universe for `alphabet`
 * (ASCII letters when omitted).
 */
export function buildCategoryTable(
  alphabet: string = ASCII_LETTERS
): CategoryTable {
  const word = uniqueChars(alphabet, DIGITS, '_');
  const printable = uniqueChars(alphabet, DIGITS, '_', PUNCTUATION, WHITESPACE);
  const digits = uniqueChars(DIGITS);
  const space = uniqueChars(WHITESPACE);

  return freezeTable({
    alphabet,
    printable,
    categories: {
      digit: digits,
      'not-digit': without(printable, digits),
      space,
      'not-space': without(printable, space),
      word,
      'not-word': without(printable, word),
    },
  });
}

const tableCache = new Map<string, CategoryTable>();

/**
 * Memoized {@link buildCategoryTable}; tables are frozen and safe to share.
 */
export function getCategoryTable(alphabet?: string): CategoryTable {
  const key = alphabet ?? ASCII_LETTERS;
  let table = tableCache.get(key);
  if (!table) {
    table = buildCategoryTable(key);
    tableCache.set(key, table);
  }
  return table;
}
