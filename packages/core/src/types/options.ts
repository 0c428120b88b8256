/**
 * Configuration options for pattern generators
 *
 * Every option is optional. Unset options fall back to the process-wide
 * defaults (see config/defaults.ts), and each generator keeps a frozen
 * snapshot of the result.
 */

import type { MetricsCollector } from '../util/metrics.js';
import type { Seed } from '../util/rng.js';
import { ConfigError, InvalidArgumentError } from './errors.js';

/**
 * Settings shared by the defaults holder and individual generators
 */
export interface GeneratorConfig {
  /** Upper bound used for `*`, `+` and `{n,}` (default: 100) */
  maxRepeat: number;
  /** Letters replacing ASCII letters in `\w`, `\W`, `.` and negated classes */
  alphabet?: string;
}

/**
 * Per-instance options accepted by the PatternGenerator constructor
 */
export interface GeneratorOptions extends Partial<GeneratorConfig> {
  /** Seed for reproducible output; omitted means a random seed */
  seed?: Seed;
  /** Collector that receives phase timings and counters */
  metrics?: MetricsCollector;
}

export type ResolvedConfig = Readonly<GeneratorConfig>;

export const DEFAULT_MAX_REPEAT = 100;

export const DEFAULT_CONFIG: ResolvedConfig = Object.freeze({
  maxRepeat: DEFAULT_MAX_REPEAT,
});

/**
 * Where a setting came from. A bad repeat limit passed to a constructor is an
 * argument error; the same value passed to `configure` is a config error.
 */
export type ConfigSource = 'configure' | 'constructor';

/**
 * Merge `overrides` over `defaults`, validate, and freeze the result.
 */
export function resolveGeneratorConfig(
  overrides: Partial<GeneratorConfig> = {},
  defaults: ResolvedConfig = DEFAULT_CONFIG,
  source: ConfigSource = 'constructor'
): ResolvedConfig {
  const resolved: GeneratorConfig = {
    maxRepeat: overrides.maxRepeat ?? defaults.maxRepeat,
  };
  const alphabet = overrides.alphabet ?? defaults.alphabet;
  if (alphabet !== undefined) resolved.alphabet = alphabet;

  validateConfig(resolved, source);
  return Object.freeze(resolved);
}

/**
 * Validate configuration values
 */
export function validateConfig(
  config: Partial<GeneratorConfig>,
  source: ConfigSource = 'constructor'
): void {
  const { maxRepeat, alphabet } = config;

  if (
    maxRepeat !== undefined &&
    (!Number.isInteger(maxRepeat) || maxRepeat < 1)
  ) {
    const params = {
      message: `maxRepeat must be an integer >= 1, got ${String(maxRepeat)}`,
      context: { setting: 'maxRepeat', argument: 'maxRepeat', value: maxRepeat },
    };
    throw source === 'configure'
      ? new ConfigError(params)
      : new InvalidArgumentError(params);
  }

  if (alphabet !== undefined) {
    if (typeof alphabet !== 'string') {
      throw new ConfigError({
        message: `alphabet must be a string, got ${typeof alphabet}`,
        context: { setting: 'alphabet', value: alphabet },
      });
    }
    if (alphabet.length === 0) {
      throw new ConfigError({
        message: 'alphabet must not be empty',
        context: { setting: 'alphabet', value: alphabet },
        suggestions: ['Omit the alphabet to use ASCII letters'],
      });
    }
  }
}
