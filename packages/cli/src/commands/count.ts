import type { Command } from 'commander';
import { formatCardinality } from '@regexforge/core';

import { resolveOutputFormat, type CliOptions } from '../flags.js';
import { addGeneratorOptions, openGenerator } from './shared.js';

export function registerCountCommand(program: Command): void {
  addGeneratorOptions(
    program
      .command('count')
      .description('Print how many strings a pattern can produce')
  )
    .option('--out <format>', 'Output format: text|json', 'text')
    .action((pattern: string, options: CliOptions) => {
      const format = resolveOutputFormat(options.out);
      const session = openGenerator(pattern, options);
      const { generator } = session;
      const count = formatCardinality(generator.count());

      if (format === 'text') {
        process.stdout.write(count + '\n');
      } else {
        process.stdout.write(
          JSON.stringify({ pattern: generator.source, count }) + '\n'
        );
      }
      session.finish();
    });
}
