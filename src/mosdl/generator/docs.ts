/**
 * Documentation formatting
 *
 * Comments render as `/// text`, or as a `"""` block when they span lines.
 * SUPPRESS drops every comment; BULK gathers an operation's documentation
 * into one block ahead of the operation.
 */

import { MESSAGE_STAGES, getStageTag } from '../spec/defaults.js'
import type { InteractionStage, Message, Operation } from '../spec/types.js'
import { hasText, type RenderContext } from './context.js'
import type { ErrorView } from './errors.js'

export const LINE_COMMENT = '/// '

export const BLOCK_COMMENT = '"""'

/**
 * Write a comment at the current indentation
 */
export function writeDoc(ctx: RenderContext, doc: string | undefined): void {
  if (ctx.docType === 'SUPPRESS' || !hasText(doc)) {
    return
  }

  const { writer } = ctx
  if (!doc.includes('\n')) {
    writer.writeLine(LINE_COMMENT, doc)
    return
  }

  writer.writeLine(BLOCK_COMMENT)
  for (const line of doc.trim().split(/\r\n|\n/)) {
    writer.writeLine(line)
  }
  writer.writeLine(BLOCK_COMMENT)
}

/**
 * Whether an error carries documentation of its own or on its extra information
 */
export function hasErrorDoc(error: ErrorView): boolean {
  return hasText(error.comment) || hasText(error.extraInfoComment)
}

/**
 * Build the aggregated BULK documentation of an operation
 *
 * The operation comment comes first, then one paragraph per message stage
 * with `@<stage>` and `@<stage>param` tags, then `@error` and `@errorinfo`
 * tags. Returns an empty string when nothing is documented.
 */
export function buildOperationDoc(op: Operation, errors: ErrorView[]): string {
  const messages: readonly Message[] = op.messages
  const stages: readonly InteractionStage[] = MESSAGE_STAGES[op.pattern]

  let doc = op.comment ?? ''
  messages.forEach((message, index) => {
    const tag = getStageTag(stages[index])
    if (hasText(message.comment) || message.fields.length > 0) {
      doc += '\n'
    }
    if (hasText(message.comment)) {
      doc += `\n@${tag}: ${message.comment}`
    }
    for (const field of message.fields) {
      if (hasText(field.comment)) {
        doc += `\n@${tag}param ${field.name}: ${field.comment}`
      }
    }
  })

  if (errors.some(hasErrorDoc)) {
    doc += '\n'
  }
  for (const error of errors) {
    if (hasText(error.comment)) {
      doc += `\n@error ${error.name}: ${error.comment}`
    }
    if (hasText(error.extraInfoComment)) {
      doc += `\n@errorinfo ${error.name}: ${error.extraInfoComment}`
    }
  }

  return doc.trim()
}

/**
 * Write the documentation preceding an operation line
 */
export function writeOperationDoc(ctx: RenderContext, op: Operation, errors: ErrorView[]): void {
  switch (ctx.docType) {
    case 'SUPPRESS':
      return
    case 'INLINE':
      writeDoc(ctx, op.comment)
      return
    case 'BULK':
      writeDoc(ctx, buildOperationDoc(op, errors))
      return
  }
}
