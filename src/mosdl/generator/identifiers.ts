/**
 * Identifier escaping
 */

import { KEYWORDS } from '../spec/defaults.js'

/**
 * Quote an identifier that collides with a MOSDL reserved word
 *
 * @example
 * ```typescript
 * escapeId('request') // '"request"'
 * escapeId('Request') // 'Request'
 * ```
 */
export function escapeId(id: string): string {
  if (KEYWORDS.has(id)) {
    return `"${id}"`
  }
  return id
}
