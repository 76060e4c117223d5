/**
 * Generator error classes
 */

import { getExitCodeForCode, type ErrorCode } from './codes.js'

/**
 * Base error for everything the generator reports
 */
export class MosdlError extends Error {
  /** Exit code the CLI terminates with */
  public readonly exitCode: number

  constructor(
    /** String error code (e.g., 'OUTPUT_FAILURE') */
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'MosdlError'
    this.exitCode = getExitCodeForCode(code)
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): { code: string; exitCode: number; message: string; details?: unknown } {
    return {
      code: this.code,
      exitCode: this.exitCode,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    }
  }
}

/**
 * Output unit could not be created, written or closed.
 *
 * Aborts the whole run; output already written for the failing area
 * must be treated as discarded.
 */
export class GenerationError extends MosdlError {
  constructor(
    message: string,
    public readonly area: string,
    cause: unknown
  ) {
    super('OUTPUT_FAILURE', message, { area }, { cause })
    this.name = 'GenerationError'
  }
}

/**
 * Specification input could not be parsed
 */
export class SpecParseError extends MosdlError {
  constructor(
    message: string,
    public readonly format?: 'json' | 'yaml',
    public readonly position?: { line: number; column: number },
    cause?: unknown
  ) {
    super('PARSE_ERROR', message, { format, position }, { cause })
    this.name = 'SpecParseError'
  }
}
