import type { Command } from 'commander';

import {
  DEFAULT_TAKE,
  resolveInteger,
  resolveOutputFormat,
  type CliOptions,
} from '../flags.js';
import { take, writeValues } from '../output.js';
import { addGeneratorOptions, openGenerator } from './shared.js';

export function registerEnumerateCommand(program: Command): void {
  addGeneratorOptions(
    program
      .command('enumerate')
      .description('List every string a pattern can produce, in order')
  )
    .option('--limit <number>', 'Cap for *, + and {n,} (default: max-repeat)')
    .option(
      '--take <number>',
      'Stop after this many values',
      String(DEFAULT_TAKE)
    )
    .option('--out <format>', 'Output format: text|json|ndjson', 'text')
    .action((pattern: string, options: CliOptions) => {
      const format = resolveOutputFormat(options.out);
      const max = resolveInteger('take', options.take, 1, DEFAULT_TAKE);
      const limit = resolveInteger('limit', options.limit, 1);
      const session = openGenerator(pattern, options);

      writeValues(take(session.generator.enumerate({ limit }), max), format);
      session.finish();
    });
}
