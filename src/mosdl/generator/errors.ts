/**
 * Uniform view over error definitions and error references
 */

import { isErrorReference, type ErrorDefinition, type OperationError, type TypeReference } from '../spec/types.js'
import type { RenderContext } from './context.js'
import { escapeId } from './identifiers.js'
import { resolveType } from './type-resolver.js'

export interface ErrorView {
  /** Name used in documentation tags */
  name: string
  /** Text rendered in `throws` clauses and error declarations */
  label: string
  comment?: string
  extraInfoType?: TypeReference
  extraInfoComment?: string
}

/**
 * Describe an error introduced at area, service or operation scope
 */
export function describeDefinition(error: ErrorDefinition): ErrorView {
  return {
    name: error.name,
    label: `error ${escapeId(error.name)} [${error.number}]`,
    comment: error.comment,
    extraInfoType: error.extraInformation?.type,
    extraInfoComment: error.extraInformation?.comment,
  }
}

/**
 * Normalize an error variant once, so renderers never inspect the variant again
 */
export function describeError(error: OperationError, ctx: Pick<RenderContext, 'area' | 'service'>): ErrorView {
  if (!isErrorReference(error)) {
    return describeDefinition(error)
  }

  const resolved = resolveType(error.type, ctx)
  return {
    name: resolved,
    label: resolved,
    comment: error.comment,
    extraInfoType: error.extraInformation?.type,
    extraInfoComment: error.extraInformation?.comment,
  }
}
