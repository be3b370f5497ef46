/**
 * Error Code Infrastructure
 * Stable error codes and CLI exit codes.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Input document errors (E001–E099)
  INVALID_SCHEMA_DOCUMENT = 'E010',
  SCHEMA_PARSE_FAILED = 'E011',
  DUPLICATE_DECLARATION = 'E012',

  // Resolution errors (E100–E199)
  UNRESOLVED_REFERENCE = 'E100',
  NAME_COLLISION = 'E110',

  // Test-data errors (E200–E299)
  RECURSION_LIMIT_EXCEEDED = 'E200',

  // Configuration errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Output errors (E400–E499)
  WRITE_FAILED = 'E400',

  // Internal errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_SCHEMA_DOCUMENT]: 20,
  [ErrorCode.SCHEMA_PARSE_FAILED]: 21,
  [ErrorCode.DUPLICATE_DECLARATION]: 22,
  [ErrorCode.UNRESOLVED_REFERENCE]: 30,
  [ErrorCode.NAME_COLLISION]: 31,
  [ErrorCode.RECURSION_LIMIT_EXCEEDED]: 40,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.WRITE_FAILED]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
