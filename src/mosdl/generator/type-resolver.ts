/**
 * Type name resolution
 *
 * Decides how much qualification a type reference needs relative to the
 * area and service being rendered.
 */

import { MAL_AREA, MAL_FUNDAMENTALS } from '../spec/defaults.js'
import type { TypeReference } from '../spec/types.js'
import type { RenderContext } from './context.js'
import { escapeId } from './identifiers.js'

/**
 * Whether the reference points at a built-in MAL type
 */
export function isMalFundamental(ref: TypeReference): boolean {
  return ref.area === MAL_AREA && ref.service === undefined && MAL_FUNDAMENTALS.has(ref.name)
}

/**
 * Render a type reference
 *
 * The area prefix is only dropped inside a service, for a type of that
 * service. Area-level types are always area-qualified, since a type with the
 * same name may exist in the area and in a service.
 *
 * @param nullable - Whether the element carrying the reference may be null
 */
export function resolveType(
  ref: TypeReference,
  ctx: Pick<RenderContext, 'area' | 'service'>,
  nullable = false
): string {
  const isSameArea = ctx.area !== undefined && ctx.area.name === ref.area
  const isSameService = ctx.service !== undefined && ctx.service.name === ref.service

  let result = ''
  if (ref.list) {
    result += nullable ? 'List?<' : 'List<'
  }
  if (!isMalFundamental(ref) && !(isSameArea && isSameService)) {
    result += `${escapeId(ref.area)}::`
  }
  if (ref.service !== undefined && ref.service !== ctx.service?.name) {
    result += `${escapeId(ref.service)}.`
  }
  result += escapeId(ref.name)
  if (ref.list) {
    result += '>'
  } else if (nullable) {
    result += '?'
  }
  return result
}
