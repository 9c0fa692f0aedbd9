/**
 * Error Code Infrastructure
 * Stable error codes and the CLI exit codes they map to.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Scan Errors (E100–E199)
  UNBALANCED_LITERAL = 'E100',
  MALFORMED_FIELD = 'E110',

  // IO Errors (E200–E299)
  FILE_ACCESS_FAILED = 'E200',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.UNBALANCED_LITERAL]: 10,
  [ErrorCode.MALFORMED_FIELD]: 11,
  [ErrorCode.FILE_ACCESS_FAILED]: 20,
  [ErrorCode.CONFIGURATION_ERROR]: 30,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
