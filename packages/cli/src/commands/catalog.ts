import type { Command } from 'commander';
import { ALPHABETS, PATTERNS } from '@regexforge/core';

export function registerCatalogCommands(program: Command): void {
  program
    .command('patterns')
    .description('List built-in patterns (use them as @NAME)')
    .action(() => {
      for (const [name, source] of Object.entries(PATTERNS)) {
        process.stdout.write(`${name}\t${source}\n`);
      }
    });

  program
    .command('alphabets')
    .description('List alphabets accepted by --alphabet')
    .action(() => {
      for (const [name, letters] of Object.entries(ALPHABETS)) {
        process.stdout.write(`${name}\t${[...letters].length}\n`);
      }
    });
}
