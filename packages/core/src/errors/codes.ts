/**
 * Stable error codes and their process exit codes.
 */

export type Severity = 'info' | 'warn' | 'error';

export enum ErrorCode {
  // Resolution (E100–E199)
  ENUM_PATH_MALFORMED = 'E101',
  CLASS_NOT_FOUND = 'E102',
  ENUM_NOT_FOUND = 'E103',
  UNSUPPORTED_HINT = 'E104',
  UNSUPPORTED_KIND = 'E105',
  SCHEMA_NOT_CACHED = 'E110',

  // Graph (E200–E299)
  DANGLING_REFERENCE = 'E201',
  DEPTH_LIMIT_EXCEEDED = 'E202',

  // Validation (E300–E399)
  SCHEMA_VALIDATION_FAILED = 'E301',
  INVALID_GENERATED_SCHEMA = 'E302',

  // Conversion (E400–E499)
  TYPE_MISMATCH = 'E401',
  EXPECTED_INTEGER_GOT_FLOAT = 'E402',
  INTEGER_OUT_OF_RANGE = 'E403',
  PROPERTY_COUNT_MISMATCH = 'E404',
  MISSING_PROPERTY = 'E405',
  UNKNOWN_PROPERTY = 'E406',
  TUPLE_ARITY_MISMATCH = 'E407',
  UNKNOWN_VARIANT = 'E408',

  // Host (E500–E599)
  CONSTRUCTION_FAILED = 'E501',
  PROPERTY_ASSIGNMENT_FAILED = 'E502',
  PROPERTY_LIST_FAILED = 'E503',

  // Configuration (E600–E699)
  CONFIGURATION_ERROR = 'E600',

  // Parse (E700–E799)
  PARSE_ERROR = 'E700',

  // Internal (E900)
  INTERNAL_ERROR = 'E900',
}

export const EXIT_CODES = {
  [ErrorCode.ENUM_PATH_MALFORMED]: 10,
  [ErrorCode.CLASS_NOT_FOUND]: 11,
  [ErrorCode.ENUM_NOT_FOUND]: 12,
  [ErrorCode.UNSUPPORTED_HINT]: 13,
  [ErrorCode.UNSUPPORTED_KIND]: 14,
  [ErrorCode.SCHEMA_NOT_CACHED]: 15,
  [ErrorCode.DANGLING_REFERENCE]: 20,
  [ErrorCode.DEPTH_LIMIT_EXCEEDED]: 21,
  [ErrorCode.SCHEMA_VALIDATION_FAILED]: 30,
  [ErrorCode.INVALID_GENERATED_SCHEMA]: 31,
  [ErrorCode.TYPE_MISMATCH]: 40,
  [ErrorCode.EXPECTED_INTEGER_GOT_FLOAT]: 41,
  [ErrorCode.INTEGER_OUT_OF_RANGE]: 42,
  [ErrorCode.PROPERTY_COUNT_MISMATCH]: 43,
  [ErrorCode.MISSING_PROPERTY]: 44,
  [ErrorCode.UNKNOWN_PROPERTY]: 45,
  [ErrorCode.TUPLE_ARITY_MISMATCH]: 46,
  [ErrorCode.UNKNOWN_VARIANT]: 47,
  [ErrorCode.CONSTRUCTION_FAILED]: 50,
  [ErrorCode.PROPERTY_ASSIGNMENT_FAILED]: 51,
  [ErrorCode.PROPERTY_LIST_FAILED]: 52,
  [ErrorCode.CONFIGURATION_ERROR]: 60,
  [ErrorCode.PARSE_ERROR]: 70,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
