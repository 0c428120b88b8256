// Exact string counts: a non-negative bigint, or infinity for open-ended quantifiers.

export type Cardinality =
  | { readonly kind: 'finite'; readonly value: bigint }
  | { readonly kind: 'infinite' };

export const ZERO: Cardinality = Object.freeze({ kind: 'finite', value: 0n });
export const ONE: Cardinality = Object.freeze({ kind: 'finite', value: 1n });
export const INFINITE: Cardinality = Object.freeze({ kind: 'infinite' });

export function finite(value: bigint | number): Cardinality {
  const v = typeof value === 'bigint' ? value : BigInt(value);
  if (v < 0n) throw new RangeError('Cardinality must be non-negative');
  return { kind: 'finite', value: v };
}

export function isInfinite(c: Cardinality): c is { kind: 'infinite' } {
  return c.kind === 'infinite';
}

export function isZero(c: Cardinality): boolean {
  return c.kind === 'finite' && c.value === 0n;
}

export function add(a: Cardinality, b: Cardinality): Cardinality {
  if (a.kind === 'infinite' || b.kind === 'infinite') return INFINITE;
  return { kind: 'finite', value: a.value + b.value };
}

/**
 * Product where zero absorbs infinity: `0 * ∞ = 0`.
 */
export function multiply(a: Cardinality, b: Cardinality): Cardinality {
  if (isZero(a) || isZero(b)) return ZERO;
  if (a.kind === 'infinite' || b.kind === 'infinite') return INFINITE;
  return { kind: 'finite', value: a.value * b.value };
}

/**
 * Sum of `base^k` for k in [min, max], with `0^0 = 1`.
 */
export function powerSum(base: bigint, min: number, max: number): bigint {
  let total = 0n;
  let term = base ** BigInt(min);
  for (let k = min; k <= max; k++) {
    total += term;
    term *= base;
  }
  return total;
}

/**
 * Compare a cardinality with a plain count; infinity is larger than any count.
 */
export function exceeds(c: Cardinality, n: number | bigint): boolean {
  if (c.kind === 'infinite') return true;
  return c.value > BigInt(n);
}

/**
 * Order two cardinalities: negative, zero or positive like a sort comparator.
 */
export function compare(a: Cardinality, b: Cardinality): number {
  if (a.kind === 'infinite') return b.kind === 'infinite' ? 0 : 1;
  if (b.kind === 'infinite') return -1;
  if (a.value === b.value) return 0;
  return a.value < b.value ? -1 : 1;
}

export function formatCardinality(c: Cardinality): string {
  return c.kind === 'infinite' ? 'infinite' : c.value.toString();
}

/**
 * Lossy view for callers that want a plain number: `Infinity` for the infinite
 * case and for finite counts beyond `Number.MAX_SAFE_INTEGER`.
 */
export function toNumber(c: Cardinality): number {
  if (c.kind === 'infinite') return Number.POSITIVE_INFINITY;
  if (c.value > BigInt(Number.MAX_SAFE_INTEGER)) {
    return Number.POSITIVE_INFINITY;
  }
  return Number(c.value);
}
