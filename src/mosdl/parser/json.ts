/**
 * JSON Parser for service specifications
 */

import { SpecParseError } from '../../errors/index.js'
import type { Specification } from '../spec/types.js'

/**
 * Parse a JSON string into a specification
 *
 * @param content - JSON string to parse
 * @returns Parsed specification (unvalidated)
 * @throws SpecParseError if parsing fails
 */
export function parseJson(content: string): Specification {
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (err) {
    if (!(err instanceof SyntaxError)) {
      throw new SpecParseError(`Failed to parse JSON: ${String(err)}`, 'json', undefined, err)
    }
    const position = findErrorPosition(content, err.message)
    const where = position ? ` at line ${position.line}, column ${position.column}` : ''
    throw new SpecParseError(`Invalid JSON${where}: ${err.message}`, 'json', position, err)
  }

  return toSpecification(parsed, 'json')
}

/**
 * Check the document root and hand it over unvalidated
 */
export function toSpecification(parsed: unknown, format: 'json' | 'yaml'): Specification {
  if (typeof parsed !== 'object' || parsed === null || !('areas' in parsed) || !Array.isArray(parsed.areas)) {
    throw new SpecParseError('Specification must be an object with an "areas" array', format)
  }
  return parsed as Specification
}

/**
 * 1-based line and column of a character offset
 */
export function locate(content: string, offset: number): { line: number; column: number } {
  const preceding = content.slice(0, offset).split(/\r\n|\n/)
  return { line: preceding.length, column: preceding[preceding.length - 1].length + 1 }
}

// V8 reports either `(line L column C)` or `at position N`, depending on the error
function findErrorPosition(content: string, message: string): { line: number; column: number } | undefined {
  const lineColumn = /line (\d+) column (\d+)/.exec(message)
  if (lineColumn) {
    return { line: Number(lineColumn[1]), column: Number(lineColumn[2]) }
  }
  const offset = /position (\d+)/.exec(message)
  return offset ? locate(content, Number(offset[1])) : undefined
}
