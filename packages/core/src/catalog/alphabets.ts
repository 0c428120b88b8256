import { createRequire } from 'node:module';

import { ConfigError } from '../types/errors.js';

const requireJson = createRequire(import.meta.url);

type CodePointRange = readonly [from: number, to: number];

function isRange(value: unknown): value is CodePointRange {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    value.every((n) => Number.isInteger(n) && n >= 0 && n <= 0x10ffff) &&
    value[0] <= value[1]
  );
}

function expand(name: string, ranges: unknown): string {
  if (!Array.isArray(ranges) || !ranges.every(isRange)) {
    throw new ConfigError({
      message: `Alphabet "${name}" in alphabets.json is not a list of code point ranges`,
      context: { setting: 'alphabet', value: name },
    });
  }
  let letters = '';
  for (const [from, to] of ranges) {
    for (let cp = from; cp <= to; cp++) letters += String.fromCodePoint(cp);
  }
  return letters;
}

function loadAlphabets(): Readonly<Record<string, string>> {
  const raw: unknown = requireJson('../../data/alphabets.json');
  if (typeof raw !== 'object' || raw === null) {
    throw new ConfigError({
      message: 'alphabets.json must contain an object',
      context: { setting: 'alphabet' },
    });
  }
  const alphabets: Record<string, string> = {};
  for (const [name, ranges] of Object.entries(raw)) {
    alphabets[name] = expand(name, ranges);
  }
  return Object.freeze(alphabets);
}

/**
 * Named letter sets for the `alphabet` setting, keyed by lowercase name
 * (`ascii`, `cyrillic`, `greek`, ...).
 */
export const ALPHABETS = loadAlphabets();

export function listAlphabets(): string[] {
  return Object.keys(ALPHABETS);
}

export function getAlphabet(name: string): string {
  const letters = ALPHABETS[name.toLowerCase()];
  if (letters === undefined) {
    throw new ConfigError({
      message: `Unknown alphabet "${name}"`,
      context: { setting: 'alphabet', value: name },
      suggestions: [`Known alphabets: ${listAlphabets().join(', ')}`],
    });
  }
  return letters;
}
