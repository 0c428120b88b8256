import {
  DEFAULT_CONFIG,
  resolveGeneratorConfig,
  type GeneratorConfig,
  type ResolvedConfig,
} from '../types/options.js';

let current: ResolvedConfig = DEFAULT_CONFIG;

/**
 * Update the process-wide defaults read by generators at construction.
 * The new values are validated first; a rejected call changes nothing.
 * Settings left undefined keep their current value.
 */
export function configure(settings: Partial<GeneratorConfig>): ResolvedConfig {
  current = resolveGeneratorConfig(settings, current, 'configure');
  return current;
}

/** Restore `{ maxRepeat: 100 }` with no alphabet. */
export function resetConfig(): void {
  current = DEFAULT_CONFIG;
}

export function getDefaultConfig(): ResolvedConfig {
  return current;
}
