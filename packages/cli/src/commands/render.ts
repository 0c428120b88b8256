import type { Command } from 'commander';
import { DEFAULT_MAX_ATTEMPTS } from '@regexforge/core';

import {
  resolveInteger,
  resolveOutputFormat,
  type CliOptions,
} from '../flags.js';
import { writeValues } from '../output.js';
import { addGeneratorOptions, openGenerator } from './shared.js';

export function registerRenderCommand(program: Command): void {
  addGeneratorOptions(
    program
      .command('render')
      .description('Render random strings that match a pattern')
  )
    .option('-n, --count <number>', 'Number of values to render', '1')
    .option('--seed <value>', 'Seed for reproducible output')
    .option('--unique', 'Render distinct values only', false)
    .option(
      '--max-attempts <number>',
      'Render attempts allowed for --unique',
      String(DEFAULT_MAX_ATTEMPTS)
    )
    .option('--out <format>', 'Output format: text|json|ndjson', 'text')
    .action((pattern: string, options: CliOptions) => {
      const count = resolveInteger('count', options.count, 0, 1);
      const format = resolveOutputFormat(options.out);
      const session = openGenerator(pattern, options);
      const { generator } = session;

      const values = options.unique
        ? generator.renderSet(count, {
            maxAttempts: resolveInteger(
              'max-attempts',
              options.maxAttempts,
              1,
              DEFAULT_MAX_ATTEMPTS
            ),
          })
        : generator.stream(count);
      writeValues(values, format);
      session.finish();
    });
}
