/**
 * Error Codes
 *
 * Central definition of all generator error codes with both string
 * identifiers and process exit codes used by the command line.
 */

/**
 * Error code definition with string identifier and exit code
 */
export interface ErrorCodeDef {
  /** String identifier (e.g., 'OUTPUT_FAILURE') */
  code: string
  /** Process exit code reported by the CLI */
  exitCode: number
  /** Default message */
  message: string
}

/**
 * All generator error codes
 */
export const ErrorCodes = {
  /** Invalid generator configuration (unknown doc type, empty output dir) */
  INVALID_CONFIG: {
    code: 'INVALID_CONFIG',
    exitCode: 2,
    message: 'Invalid configuration',
  },

  /** Specification file could not be read or parsed */
  PARSE_ERROR: {
    code: 'PARSE_ERROR',
    exitCode: 3,
    message: 'Failed to parse specification',
  },

  /** An output unit could not be created, written or closed */
  OUTPUT_FAILURE: {
    code: 'OUTPUT_FAILURE',
    exitCode: 4,
    message: 'Failed to write output',
  },

  /** Unknown error */
  UNKNOWN: {
    code: 'UNKNOWN',
    exitCode: 1,
    message: 'Unknown error',
  },
} as const satisfies Record<string, ErrorCodeDef>

/**
 * Error code type (string union)
 */
export type ErrorCode = keyof typeof ErrorCodes

/**
 * Get error code definition by string code
 */
export function getErrorCode(code: string): ErrorCodeDef {
  const table: Record<string, ErrorCodeDef> = ErrorCodes
  if (Object.hasOwn(table, code)) {
    return table[code]
  }

  return {
    code,
    exitCode: 1,
    message: code,
  }
}

/**
 * Get process exit code for a string code
 */
export function getExitCodeForCode(code: string): number {
  return getErrorCode(code).exitCode
}
