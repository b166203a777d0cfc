/**
 * Error Code Infrastructure
 * Stable error codes, exit codes, and HTTP status mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Contract and route table errors (E001–E099)
  INVALID_CONTRACT = 'E010',
  SCHEMA_COMPILE_FAILED = 'E011',
  DUPLICATE_ROUTE = 'E012',

  // Validation errors (E200–E299)
  REQUEST_SCHEMA_MISMATCH = 'E200',
  RESPONSE_SCHEMA_MISMATCH = 'E201',

  // Configuration errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Input errors (E400–E499)
  DESERIALIZATION_FAILED = 'E400',
  ROUTE_MODULE_INVALID = 'E401',

  // Internal errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_CONTRACT]: 20,
  [ErrorCode.SCHEMA_COMPILE_FAILED]: 21,
  [ErrorCode.DUPLICATE_ROUTE]: 22,
  [ErrorCode.REQUEST_SCHEMA_MISMATCH]: 40,
  [ErrorCode.RESPONSE_SCHEMA_MISMATCH]: 41,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.DESERIALIZATION_FAILED]: 60,
  [ErrorCode.ROUTE_MODULE_INVALID]: 61,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

// HTTP status mapping for API responses
export const HTTP_STATUS_BY_CODE = {
  [ErrorCode.INVALID_CONTRACT]: 500,
  [ErrorCode.SCHEMA_COMPILE_FAILED]: 500,
  [ErrorCode.DUPLICATE_ROUTE]: 500,
  [ErrorCode.REQUEST_SCHEMA_MISMATCH]: 422,
  [ErrorCode.RESPONSE_SCHEMA_MISMATCH]: 500,
  [ErrorCode.CONFIGURATION_ERROR]: 500,
  [ErrorCode.DESERIALIZATION_FAILED]: 400,
  [ErrorCode.ROUTE_MODULE_INVALID]: 500,
  [ErrorCode.INTERNAL_ERROR]: 500,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}

export function getHttpStatus(code: ErrorCode): number {
  return HTTP_STATUS_BY_CODE[code];
}
