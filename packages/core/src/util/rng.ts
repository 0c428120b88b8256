import { randomBytes } from 'node:crypto';

/**
 * Values accepted as a seed. Equal seeds give equal random sequences.
 */
export type Seed = number | bigint | string | Uint8Array;

const FNV_OFFSET_BASIS = 2166136261;
const FNV_PRIME = 16777619;

// xorshift32 never leaves the all-zero state
const ZERO_STATE_REPLACEMENT = 0x9e3779b9;

/**
 * 32-bit FNV-1a hash of a string over UTF-16 code units.
 * offset-basis: 2166136261, prime: 16777619, modulo 2^32
 */
export function fnv1a32(s: string, basis: number = FNV_OFFSET_BASIS): number {
  let x = basis >>> 0;
  for (let i = 0; i < s.length; i++) {
    x ^= s.charCodeAt(i);
    x = Math.imul(x, FNV_PRIME) >>> 0;
  }
  return x >>> 0;
}

/** 32-bit FNV-1a hash over raw bytes. */
export function fnv1a32Bytes(bytes: Uint8Array): number {
  let x = FNV_OFFSET_BASIS >>> 0;
  for (const byte of bytes) {
    x ^= byte;
    x = Math.imul(x, FNV_PRIME) >>> 0;
  }
  return x >>> 0;
}

/**
 * Fold a seed of any supported type into a uint32.
 * Each type is tagged so that `42`, `42n` and `'42'` give different states.
 */
export function seedToUint32(seed: Seed): number {
  if (typeof seed === 'string') return fnv1a32(`s:${seed}`);
  if (typeof seed === 'bigint') return fnv1a32(`b:${seed.toString(16)}`);
  if (seed instanceof Uint8Array) {
    return fnv1a32('u:', fnv1a32Bytes(seed));
  }
  if (Number.isSafeInteger(seed)) {
    const lo = seed >>> 0;
    const hi = Math.floor(Math.abs(seed) / 0x100000000) >>> 0;
    return (lo ^ Math.imul(hi, FNV_PRIME) ^ (seed < 0 ? 0x80000000 : 0)) >>> 0;
  }
  return fnv1a32(`n:${String(seed)}`);
}

function entropySeed(): number {
  return randomBytes(4).readUInt32BE(0);
}

/**
 * xorshift32 RNG with uint32 state.
 * Initialization: x = seedToUint32(seed) ^ fnv1a32(salt)
 * Step: x ^= x << 13; x ^= x >>> 17; x ^= x << 5; (all masked to uint32)
 * next() returns x >>> 0
 */
export class XorShift32 {
  private x = ZERO_STATE_REPLACEMENT;

  constructor(
    seed?: Seed,
    private readonly salt: string = ''
  ) {
    this.reseed(seed);
  }

  /** Reset the state; omitting the seed draws one from the OS. */
  reseed(seed?: Seed): void {
    const base = seed === undefined ? entropySeed() : seedToUint32(seed);
    const state = (base ^ fnv1a32(this.salt)) >>> 0;
    this.x = state === 0 ? ZERO_STATE_REPLACEMENT : state;
  }

  /** Returns the next uint32 value. */
  next(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }

  /** Returns a deterministic float in [0, 1). */
  nextFloat01(): number {
    return (this.next() >>> 0) / 0x100000000;
  }

  /** Uniform integer in the closed range [min, max]. */
  nextInt(min: number, max: number): number {
    if (max < min) throw new RangeError(`Empty range [${min}, ${max}]`);
    return min + Math.floor(this.nextFloat01() * (max - min + 1));
  }

  /** Uniform pick from a non-empty list. */
  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot pick from an empty list');
    }
    const item = items[this.nextInt(0, items.length - 1)];
    if (item === undefined) throw new RangeError('Index out of bounds');
    return item;
  }
}
