/**
 * Render context threaded through every sub-renderer
 */

import type { DocType } from '../../config.js'
import type { Area, Service } from '../spec/types.js'
import type { IndentWriter } from './writer.js'

export interface RenderContext {
  writer: IndentWriter
  docType: DocType
  /** Area currently being rendered */
  area?: Area
  /** Service currently being rendered, absent at area level */
  service?: Service
}

/**
 * Whether a comment carries any text
 */
export function hasText(comment: string | undefined): comment is string {
  return comment !== undefined && comment.trim() !== ''
}
