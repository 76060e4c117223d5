/**
 * YAML Parser for service specifications
 */

import yaml from 'js-yaml'
import { SpecParseError } from '../../errors/index.js'
import type { Specification } from '../spec/types.js'
import { toSpecification } from './json.js'

/**
 * Parse a YAML string into a specification
 *
 * @param content - YAML string to parse
 * @returns Parsed specification (unvalidated)
 * @throws SpecParseError if parsing fails
 */
export function parseYaml(content: string): Specification {
  let parsed: unknown
  try {
    parsed = yaml.load(content, {
      schema: yaml.JSON_SCHEMA,
      json: true,
    })
  } catch (err) {
    if (err instanceof yaml.YAMLException) {
      const mark = err.mark
      if (mark) {
        throw new SpecParseError(
          `Invalid YAML at line ${mark.line + 1}, column ${mark.column + 1}: ${err.reason || err.message}`,
          'yaml',
          { line: mark.line + 1, column: mark.column + 1 },
          err
        )
      }
      throw new SpecParseError(`Invalid YAML: ${err.message}`, 'yaml', undefined, err)
    }
    throw new SpecParseError(`Failed to parse YAML: ${String(err)}`, 'yaml', undefined, err)
  }

  return toSpecification(parsed, 'yaml')
}
