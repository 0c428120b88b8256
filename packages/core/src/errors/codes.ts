/**
 * Error Code Infrastructure
 * Stable error codes and CLI exit codes.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Pattern Errors (E001–E099)
  UNSUPPORTED_CONSTRUCT = 'E002',

  // Generation Errors (E100–E199)
  GENERATION_FAILED = 'E100',
  CAPACITY_EXCEEDED = 'E101',
  ITERATION_LIMIT = 'E102',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',
  INVALID_ARGUMENT = 'E301',

  // Parse Errors (E400–E499)
  PATTERN_SYNTAX = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.UNSUPPORTED_CONSTRUCT]: 11,
  [ErrorCode.GENERATION_FAILED]: 30,
  [ErrorCode.CAPACITY_EXCEEDED]: 31,
  [ErrorCode.ITERATION_LIMIT]: 32,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INVALID_ARGUMENT]: 51,
  [ErrorCode.PATTERN_SYNTAX]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
