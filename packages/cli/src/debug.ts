import type { MetricsCollector, PatternGenerator } from '@regexforge/core';

/**
 * Print the effective configuration of `generator` to stderr.
 * Intended to be used behind the --debug flag.
 */
export function printGeneratorDebug(generator: PatternGenerator): void {
  process.stderr.write(`[regexforge] pattern: ${generator.toString()}\n`);
  process.stderr.write(
    `[regexforge] effective config: ${JSON.stringify(
      {
        maxRepeat: generator.config.maxRepeat,
        alphabet: generator.config.alphabet ?? null,
      },
      null,
      2
    )}\n`
  );
}

export function printMetrics(metrics: MetricsCollector): void {
  process.stderr.write(
    `[regexforge] metrics: ${JSON.stringify(metrics.snapshotMetrics())}\n`
  );
}
