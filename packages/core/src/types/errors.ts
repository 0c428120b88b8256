/**
 * Error hierarchy for regexforge
 * Provides structured error handling with context and suggestions
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  pattern?: string; // Source text of the pattern involved
  construct?: string; // Name of the offending regex construct
  setting?: string; // Configuration key that was rejected
  argument?: string; // Operation argument that was rejected
  value?: unknown; // Problematic value
  limit?: number; // Limit that was reached or exceeded
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface ErrorParams<C extends ErrorContext = ErrorContext> {
  message: string;
  errorCode?: ErrorCode;
  severity?: Severity;
  context?: C;
  cause?: Error;
  suggestions?: string[];
}

/**
 * Base error class for all regexforge errors
 */
export abstract class RegexForgeError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public readonly cause?: Error;
  public suggestions?: string[];

  constructor(params: ErrorParams & { errorCode: ErrorCode }) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;
    this.suggestions = params.suggestions;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack
   * - prod: excludes stack and the raw context value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context || !('value' in context)) return context;
    const { value: _value, ...rest } = context;
    return { ...rest, value: '[REDACTED]' };
  }
}

/**
 * The pattern text could not be compiled by the host RegExp engine
 */
export class PatternError extends RegexForgeError {
  constructor(params: ErrorParams) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.PATTERN_SYNTAX });
  }

  get pattern(): string | undefined {
    return typeof this.context?.pattern === 'string'
      ? this.context.pattern
      : undefined;
  }
}

/**
 * Invalid alphabet or repetition limit
 */
export class ConfigError extends RegexForgeError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    return typeof this.context?.setting === 'string'
      ? this.context.setting
      : undefined;
  }
}

/**
 * An operation received an out-of-range argument (negative count, limit < 1)
 */
export class InvalidArgumentError extends RegexForgeError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INVALID_ARGUMENT,
    });
  }
}

/**
 * The pattern AST holds a construct none of the engines interpret
 */
export class UnsupportedConstructError extends RegexForgeError {
  constructor(
    params: ErrorParams & { context: ErrorContext & { construct: string } }
  ) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.UNSUPPORTED_CONSTRUCT,
    });
  }

  get construct(): string {
    return String(this.context?.construct);
  }
}

/**
 * A value could not be produced (e.g. a character class that matches nothing)
 */
export class GenerationError extends RegexForgeError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.GENERATION_FAILED,
    });
  }
}

/**
 * More unique values were requested than the pattern can produce
 */
export class CapacityError extends RegexForgeError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CAPACITY_EXCEEDED,
    });
  }
}

/**
 * The attempt budget of a unique-set request ran out
 */
export class IterationLimitError extends RegexForgeError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.ITERATION_LIMIT,
    });
  }

  get limit(): number | undefined {
    return this.context?.limit;
  }
}

/**
 * Utility functions for error handling
 */
export function isRegexForgeError(error: unknown): error is RegexForgeError {
  return error instanceof RegexForgeError;
}
