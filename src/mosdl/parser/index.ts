/**
 * Specification Parser Module
 *
 * Loads service specifications from JSON or YAML. Documents are handed to
 * the generator as-is; their structure is not validated.
 */

import { readFile } from 'node:fs/promises'
import { extname } from 'node:path'
import { SpecParseError } from '../../errors/index.js'
import type { Specification } from '../spec/types.js'
import { parseJson } from './json.js'
import { parseYaml } from './yaml.js'

export { parseJson } from './json.js'
export { parseYaml } from './yaml.js'

export type SpecFormat = 'json' | 'yaml'

const FORMAT_BY_EXTENSION: Readonly<Record<string, SpecFormat>> = {
  '.json': 'json',
  '.yaml': 'yaml',
  '.yml': 'yaml',
}

/**
 * Guess the format of a document: JSON when it opens with `{` or `[`
 */
export function detectFormat(content: string): SpecFormat {
  return /^\s*[[{]/.test(content) ? 'json' : 'yaml'
}

/**
 * Format from a file extension, falling back to the content
 */
export function detectFormatFromPath(path: string, content = ''): SpecFormat {
  const extension = extname(path).toLowerCase()
  return Object.hasOwn(FORMAT_BY_EXTENSION, extension) ? FORMAT_BY_EXTENSION[extension] : detectFormat(content)
}

/**
 * Parse a string into a specification (auto-detect format)
 */
export function parse(content: string, options: { format?: SpecFormat } = {}): Specification {
  const format = options.format ?? detectFormat(content)
  return format === 'json' ? parseJson(content) : parseYaml(content)
}

/**
 * Parse a specification from a file
 *
 * @param path - File path
 * @param options - Force a specific format (auto-detect from extension if not specified)
 */
export async function parseFile(
  path: string,
  options: { format?: SpecFormat } = {}
): Promise<Specification> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (err) {
    throw new SpecParseError(`Cannot read specification '${path}': ${String(err)}`, undefined, undefined, err)
  }
  const format = options.format ?? detectFormatFromPath(path, content)

  return parse(content, { format })
}

/**
 * Combine several specifications into one, keeping area order
 */
export function mergeSpecifications(specs: Specification[]): Specification {
  return { areas: specs.flatMap((spec) => spec.areas) }
}
