import {
  ALPHABETS,
  InvalidArgumentError,
  PATTERNS,
  getAlphabet,
  isPatternName,
  type Seed,
} from '@regexforge/core';

export type OutputFormat = 'json' | 'ndjson' | 'text';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  count?: string | number;
  seed?: string;
  maxRepeat?: string | number;
  alphabet?: string;
  unique?: boolean;
  maxAttempts?: string | number;
  flags?: string;
  out?: string;
  limit?: string | number;
  take?: string | number;
  printMetrics?: boolean;
  debug?: boolean;
}

export const DEFAULT_TAKE = 1000;

function invalidFlag(flag: string, value: unknown, expected: string): never {
  throw new InvalidArgumentError({
    message: `Invalid --${flag} value "${String(value)}". Expected ${expected}.`,
    context: { argument: `--${flag}`, value: String(value) },
  });
}

/**
 * Parse an integer flag that must be at least `min`.
 * Returns `fallback` when the flag was not given.
 */
export function resolveInteger(
  flag: string,
  value: string | number | undefined,
  min: number,
  fallback: number
): number;
export function resolveInteger(
  flag: string,
  value: string | number | undefined,
  min: number
): number | undefined;
export function resolveInteger(
  flag: string,
  value: string | number | undefined,
  min: number,
  fallback?: number
): number | undefined {
  if (value === undefined) return fallback;
  const num = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(num) || num < min) {
    invalidFlag(flag, value, `an integer >= ${min}`);
  }
  return num;
}

/**
 * Integer seeds become numbers (or bigints past the safe range) so that
 * `--seed 42` matches `new PatternGenerator(p, { seed: 42 })`; anything else
 * is used as a string seed.
 */
export function resolveSeed(value: string | undefined): Seed | undefined {
  if (value === undefined) return undefined;
  if (!/^-?\d+$/.test(value)) return value;
  const asNumber = Number(value);
  return Number.isSafeInteger(asNumber) ? asNumber : BigInt(value);
}

/**
 * `--alphabet` takes a catalog name (case-insensitive) or the letters
 * themselves.
 */
export function resolveAlphabet(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (value.length === 0) invalidFlag('alphabet', value, 'a non-empty value');
  const key = value.toLowerCase();
  return Object.hasOwn(ALPHABETS, key) ? getAlphabet(key) : value;
}

/**
 * `@NAME` selects a built-in pattern (see `regexforge patterns`).
 */
export function resolvePatternArgument(value: string): string {
  if (!value.startsWith('@')) return value;
  const name = value.slice(1).toUpperCase();
  if (!isPatternName(name)) {
    throw new InvalidArgumentError({
      message: `Unknown built-in pattern "${value}"`,
      context: { argument: 'pattern', value },
      suggestions: [`Known patterns: ${Object.keys(PATTERNS).join(', ')}`],
    });
  }
  return PATTERNS[name];
}

/**
 * Resolve output format flag into a known format or throw.
 */
export function resolveOutputFormat(value: unknown): OutputFormat {
  if (value === undefined || value === null || value === '') {
    return 'text';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'json' || raw === 'ndjson' || raw === 'text') {
    return raw;
  }
  return invalidFlag('out', value, '"json", "ndjson" or "text"');
}
