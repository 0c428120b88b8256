/**
 * ErrorPresenter - pure presentation layer for RegexForgeError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import type {
  ErrorContext,
  RegexForgeError,
  SerializedError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

/** One labelled line of an error report, e.g. `construct: lookbehind` */
export interface ErrorDetail {
  label: string;
  value: string;
}

export interface CLIErrorView {
  code: ErrorCode;
  message: string;
  exitCode: number;
  /** Pattern source, printed between slashes and never wrapped */
  pattern?: string;
  details: ErrorDetail[];
  hint?: string;
  colors: boolean;
  terminalWidth: number;
}

function formatValue(value: unknown): string {
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: RegexForgeError): CLIErrorView {
    const pattern = error.context?.pattern;
    return {
      code: error.errorCode,
      message: error.message,
      exitCode: error.getExitCode(),
      pattern: typeof pattern === 'string' ? pattern : undefined,
      details: this.#collectDetails(error.context),
      hint: error.suggestions?.[0],
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  /** Serialized form for logs; `prod` redacts values and drops the stack */
  formatForProduction(error: RegexForgeError): SerializedError {
    return error.toJSON(this._env);
  }

  #collectDetails(ctx?: ErrorContext): ErrorDetail[] {
    if (!ctx) return [];
    const details: ErrorDetail[] = [];
    if (typeof ctx.construct === 'string') {
      details.push({ label: 'construct', value: ctx.construct });
    }
    if (typeof ctx.setting === 'string') {
      details.push({
        label: 'setting',
        value: `${ctx.setting} = ${formatValue(ctx.value)}`,
      });
    }
    if (typeof ctx.argument === 'string') {
      details.push({
        label: 'argument',
        value: `${ctx.argument} = ${formatValue(ctx.value)}`,
      });
    }
    return details;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }

  #getTerminalWidth(opt?: number): number {
    return opt || process.stdout.columns || 80;
  }
}
