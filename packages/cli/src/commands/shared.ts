import type { Command } from 'commander';
import { MetricsCollector, PatternGenerator } from '@regexforge/core';

import { printGeneratorDebug, printMetrics } from '../debug.js';
import {
  resolveAlphabet,
  resolveInteger,
  resolvePatternArgument,
  resolveSeed,
  type CliOptions,
} from '../flags.js';

/**
 * Options every pattern command accepts
 */
export function addGeneratorOptions(command: Command): Command {
  return command
    .argument(
      '<pattern>',
      'Regular expression, or @NAME for a built-in pattern'
    )
    .option('--flags <flags>', 'RegExp flags, e.g. "s" or "u"')
    .option('--max-repeat <number>', 'Cap for *, + and {n,} (default: 100)')
    .option(
      '--alphabet <name|letters>',
      'Catalog alphabet name or literal letters used for \\w, \\W and .'
    )
    .option('--print-metrics', 'Print metrics as JSON to stderr', false)
    .option('--debug', 'Print effective configuration to stderr', false);
}

export interface GeneratorSession {
  generator: PatternGenerator;
  /** Print debug and metrics output requested by the flags */
  finish(): void;
}

export function openGenerator(
  pattern: string,
  options: CliOptions
): GeneratorSession {
  const metrics = options.printMetrics ? new MetricsCollector() : undefined;
  const generator = new PatternGenerator(resolvePatternArgument(pattern), {
    flags: options.flags,
    seed: resolveSeed(options.seed),
    maxRepeat: resolveInteger('max-repeat', options.maxRepeat, 1),
    alphabet: resolveAlphabet(options.alphabet),
    metrics,
  });

  if (options.debug) printGeneratorDebug(generator);

  return {
    generator,
    finish() {
      if (metrics) printMetrics(metrics);
    },
  };
}
