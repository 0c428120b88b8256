import { ASCII_LETTERS, getCategoryTable } from '../charset/categories.js';
import { ClassResolver } from '../charset/class-resolver.js';
import { getDefaultConfig } from '../config/defaults.js';
import { Counter } from '../engine/counter.js';
import { Enumerator } from '../engine/enumerator.js';
import { Renderer } from '../engine/renderer.js';
import { parsePattern } from '../parser/pattern-parser.js';
import type { Pattern } from '../types/ast.js';
import {
  CapacityError,
  InvalidArgumentError,
  IterationLimitError,
  PatternError,
} from '../types/errors.js';
import {
  resolveGeneratorConfig,
  type GeneratorOptions,
  type ResolvedConfig,
} from '../types/options.js';
import { isErr } from '../types/result.js';
import {
  formatCardinality,
  type Cardinality,
} from '../util/cardinality.js';
import type { MetricPhase, MetricsCollector } from '../util/metrics.js';
import { XorShift32, type Seed } from '../util/rng.js';

export type PatternInput = string | RegExp | PatternGenerator;

export interface PatternGeneratorOptions extends GeneratorOptions {
  /** Flags for a string pattern; replaces the flags of a RegExp input */
  flags?: string;
}

export interface RenderSetOptions {
  /** Render attempts before giving up (default: 100_000) */
  maxAttempts?: number;
}

export interface EnumerateOptions {
  /** Cap for open-ended quantifiers (default: the maxRepeat setting) */
  limit?: number;
}

export const DEFAULT_MAX_ATTEMPTS = 100_000;

// RegExp#source spells the empty pattern this way
const EMPTY_REGEXP_SOURCE = '(?:)';

interface PatternText {
  source: string;
  flags: string;
}

function patternText(value: unknown): PatternText | undefined {
  if (typeof value === 'string') return { source: value, flags: '' };
  if (value instanceof RegExp) {
    const source = value.source === EMPTY_REGEXP_SOURCE ? '' : value.source;
    return { source, flags: value.flags };
  }
  if (value instanceof PatternGenerator) {
    return { source: value.source, flags: value.flags };
  }
  return undefined;
}

function describeType(value: unknown): string {
  if (typeof value === 'object') {
    return Object.prototype.toString.call(value).slice(8, -1);
  }
  return typeof value;
}

function expectPattern(value: unknown, operation: string): PatternText {
  const text = patternText(value);
  if (text === undefined) {
    throw new TypeError(
      `${operation} expects a string, RegExp or PatternGenerator, got ${describeType(value)}`
    );
  }
  return text;
}

function requireCount(value: number, argument: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError({
      message: `${argument} must be an integer >= 0, got ${value}`,
      context: { argument, value },
    });
  }
}

// Trailing `$` anchors, keeping an escaped `\$` literal
function stripEndAnchors(source: string): string {
  let end = source.length;
  while (source[end - 1] === '$') {
    let slashes = 0;
    while (source[end - 2 - slashes] === '\\') slashes++;
    if (slashes % 2 === 1) break;
    end--;
  }
  return source.slice(0, end);
}

/**
 * Generates strings that match a regular expression.
 *
 * ```ts
 * const ids = new PatternGenerator('[a-f0-9]{8}', { seed: 42 });
 * ids.render(); // same value on every run with seed 42
 * ids.count(); // { kind: 'finite', value: 4294967296n }
 * ```
 *
 * Rendering is random and reproducible for a fixed seed, with open-ended
 * quantifiers capped at `maxRepeat`. Counting is exact and reports
 * `infinite` for any open-ended quantifier. Enumeration walks every
 * derivation, capping open-ended quantifiers at its `limit`.
 */
export class PatternGenerator implements Iterable<string> {
  private readonly ast: Pattern;
  private readonly compiled: RegExp;
  private readonly settings: ResolvedConfig;
  private readonly rng: XorShift32;
  private readonly resolver: ClassResolver;
  private readonly renderer: Renderer;
  private readonly metrics?: MetricsCollector;
  private cachedCount?: Cardinality;

  constructor(pattern: PatternInput, options: PatternGeneratorOptions = {}) {
    const text = patternText(pattern);
    if (text === undefined) {
      throw new PatternError({
        message: `Expected a string, RegExp or PatternGenerator, got ${describeType(pattern)}`,
        context: { value: describeType(pattern) },
      });
    }
    const flags = options.flags ?? text.flags;
    this.metrics = options.metrics;

    const parsed = this.measure('PARSE', () =>
      parsePattern(text.source, flags)
    );
    if (isErr(parsed)) throw parsed.error;

    this.ast = parsed.value;
    this.compiled = new RegExp(text.source, flags);
    this.settings = resolveGeneratorConfig(options, getDefaultConfig());
    this.resolver = new ClassResolver(
      getCategoryTable(this.settings.alphabet),
      this.compiled.flags.includes('i')
    );
    this.rng = new XorShift32(options.seed, this.ast.source);
    this.renderer = new Renderer(this.ast, {
      resolver: this.resolver,
      rng: this.rng,
      maxRepeat: this.settings.maxRepeat,
    });
  }

  /** Compiled RegExp the generator was built from */
  get pattern(): RegExp {
    return this.compiled;
  }

  get source(): string {
    return this.ast.source;
  }

  get flags(): string {
    return this.compiled.flags;
  }

  /** Effective configuration snapshot */
  get config(): ResolvedConfig {
    return this.settings;
  }

  /** Reset the random sequence; omitting the value draws a fresh seed. */
  seed(value?: Seed): void {
    this.rng.reseed(value);
  }

  render(): string {
    const value = this.measure('RENDER', () => this.renderer.render());
    this.metrics?.addRendered(1);
    return value;
  }

  renderMany(n: number): string[] {
    requireCount(n, 'n');
    const values = this.measure('RENDER', () =>
      Array.from({ length: n }, () => this.renderer.render())
    );
    this.metrics?.addRendered(n);
    return values;
  }

  /**
   * Render until `n` distinct values are collected.
   * Fails up front when the pattern has fewer than `n` derivations.
   */
  renderSet(n: number, options: RenderSetOptions = {}): Set<string> {
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    requireCount(n, 'n');
    if (!Number.isInteger(maxAttempts) || maxAttempts < n) {
      throw new InvalidArgumentError({
        message: `maxAttempts (${maxAttempts}) must be an integer >= n (${n})`,
        context: { argument: 'maxAttempts', value: maxAttempts, limit: n },
      });
    }

    const available = this.count();
    if (available.kind === 'finite' && BigInt(n) > available.value) {
      throw new CapacityError({
        message: `Cannot render ${n} unique values: /${this.source}/ has only ${formatCardinality(available)}`,
        context: {
          pattern: this.source,
          value: n,
          limit: Number(available.value),
        },
        suggestions: ['Request fewer values or widen the pattern'],
      });
    }

    const values = new Set<string>();
    this.measure('RENDER', () => {
      let attempts = 0;
      while (values.size < n && attempts < maxAttempts) {
        attempts++;
        const value = this.renderer.render();
        this.metrics?.addRenderSetAttempt(values.has(value));
        values.add(value);
      }
    });
    this.metrics?.addRendered(values.size);

    if (values.size < n) {
      throw new IterationLimitError({
        message: `Collected ${values.size} of ${n} unique values in ${maxAttempts} attempts`,
        context: {
          pattern: this.source,
          value: values.size,
          limit: maxAttempts,
        },
        suggestions: ['Raise maxAttempts or request fewer values'],
      });
    }
    return values;
  }

  /** Exact number of derivations; cached after the first call. */
  count(): Cardinality {
    if (this.cachedCount !== undefined) {
      this.metrics?.addCountCacheHit();
      return this.cachedCount;
    }
    const counted = this.measure('COUNT', () =>
      new Counter(this.ast, this.resolver).count()
    );
    this.cachedCount = counted;
    return counted;
  }

  /**
   * Every derivation in a fixed order, lazily.
   * `limit` replaces maxRepeat as the cap for open-ended quantifiers.
   */
  enumerate(options: EnumerateOptions = {}): Generator<string> {
    const limit = options.limit ?? this.settings.maxRepeat;
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidArgumentError({
        message: `limit must be an integer >= 1, got ${limit}`,
        context: { argument: 'limit', value: limit },
      });
    }
    const strings = new Enumerator(this.ast, this.resolver, limit).strings();
    return this.metrics
      ? this.timedEnumeration(strings, this.metrics)
      : strings;
  }

  /** `n` renders, produced one at a time. */
  stream(n: number): Generator<string> {
    requireCount(n, 'n');
    return this.renders(n);
  }

  /** Infinite stream of renders */
  [Symbol.iterator](): Generator<string> {
    return this.renders(Number.POSITIVE_INFINITY);
  }

  /** Same source text and flags. */
  equals(other: PatternInput): boolean {
    const text = expectPattern(other, 'equals');
    return text.source === this.source && sameFlags(text.flags, this.flags);
  }

  /**
   * Pattern matching this one followed by `other`. Trailing `$` of this
   * source and leading `^` of the other are dropped. The result keeps this
   * generator's flags, maxRepeat and alphabet, and gets a fresh seed.
   */
  concat(other: PatternInput): PatternGenerator {
    const text = expectPattern(other, 'concat');
    const head = stripEndAnchors(this.source);
    const tail = text.source.replace(/^\^+/, '');
    return new PatternGenerator(head + tail, {
      flags: this.flags,
      maxRepeat: this.settings.maxRepeat,
      alphabet: this.settings.alphabet ?? ASCII_LETTERS,
      metrics: this.metrics,
    });
  }

  hasSource(): boolean {
    return this.source.length > 0;
  }

  toString(): string {
    return `PatternGenerator(/${this.source}/${this.flags})`;
  }

  private *renders(n: number): Generator<string> {
    for (let i = 0; i < n; i++) yield this.render();
  }

  private *timedEnumeration(
    strings: Generator<string>,
    metrics: MetricsCollector
  ): Generator<string> {
    try {
      for (;;) {
        const step = metrics.measure('ENUMERATE', () => strings.next());
        if (step.done === true) return;
        metrics.addEnumerated(1);
        yield step.value;
      }
    } finally {
      strings.return(undefined);
    }
  }

  private measure<T>(phase: MetricPhase, fn: () => T): T {
    return this.metrics ? this.metrics.measure(phase, fn) : fn();
  }
}

function sameFlags(a: string, b: string): boolean {
  return [...a].sort().join('') === [...b].sort().join('');
}
