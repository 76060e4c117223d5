/**
 * Error Factories
 *
 * Pre-built error helpers for the failures the generator reports.
 */

import { GenerationError, MosdlError } from './mosdl-error.js'

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

/**
 * Pre-built error factories for consistent error handling
 *
 * @example
 * ```typescript
 * throw Errors.output('Common', err)
 * // Creates: { code: 'OUTPUT_FAILURE', message: "Failed to write MOSDL for area 'Common': EACCES ..." }
 * ```
 */
export const Errors = {
  /**
   * Output unit failure while rendering an area
   * @param area - Name of the area being rendered
   * @param cause - Underlying I/O error
   */
  output(area: string, cause: unknown): GenerationError {
    return new GenerationError(
      `Failed to write MOSDL for area '${area}': ${describeCause(cause)}`,
      area,
      cause
    )
  },

  /**
   * Invalid configuration
   * @param issues - One message per offending option
   */
  config(issues: string[]): MosdlError {
    return new MosdlError('INVALID_CONFIG', `Invalid configuration: ${issues.join('; ')}`, { issues })
  },

  /**
   * Wrap any thrown value so callers always deal with a MosdlError
   */
  wrap(err: unknown): MosdlError {
    if (err instanceof MosdlError) {
      return err
    }
    return new MosdlError('UNKNOWN', describeCause(err), undefined, { cause: err })
  },
}
