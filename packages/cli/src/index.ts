// CLI entry point, run from source with `npm run cli -- <command>`
// - Command name: `regexforge` with subcommands `render`, `count`, `enumerate`,
//   `patterns` and `alphabets`.
// - Pattern commands build a PatternGenerator from @regexforge/core and print
//   text, JSON or NDJSON to stdout; diagnostics go to stderr as
//   `[regexforge] ...` lines.
// - Errors are formatted by the core ErrorPresenter and the process exits with
//   the error code's exit status. With NODE_ENV=production the error is one
//   redacted JSON line instead of a report.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  isRegexForgeError,
  RegexForgeError,
  ErrorCode,
} from '@regexforge/core';
import { renderErrorReport } from './render.js';
import { registerRenderCommand } from './commands/render.js';
import { registerCountCommand } from './commands/count.js';
import { registerEnumerateCommand } from './commands/enumerate.js';
import { registerCatalogCommands } from './commands/catalog.js';

class InternalError extends RegexForgeError {}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('regexforge')
    .description('Generate strings that match a regular expression')
    .version('0.1.0');

  registerRenderCommand(program);
  registerCountCommand(program);
  registerEnumerateCommand(program);
  registerCatalogCommands(program);

  return program;
}

function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env);

  let error: RegexForgeError;
  if (isRegexForgeError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause: err instanceof Error ? err : undefined,
    });
  }

  if (env === 'prod') {
    console.error(JSON.stringify(presenter.formatForProduction(error)));
  } else {
    console.error(renderErrorReport(presenter.formatForCLI(error)));
  }

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv).catch(handleCliError);
}

const entryArg = process.argv[1];
const entryFile =
  entryArg !== undefined && fs.existsSync(entryArg)
    ? fs.realpathSync(entryArg)
    : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
