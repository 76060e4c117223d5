/**
 * Interaction pattern emitter
 *
 * Renders an operation as its pattern keyword, name and id followed by the
 * pattern's fixed message sequence:
 *
 * ```
 * request getDefinition [2] (definitionId: Identifier)
 * 	-> (definition: Element)
 * 	throws MAL::UNKNOWN
 * ```
 */

import { getOperationErrors, type Message, type Operation } from '../spec/types.js'
import { hasText, type RenderContext } from './context.js'
import { hasErrorDoc, writeDoc, writeOperationDoc } from './docs.js'
import { describeError, type ErrorView } from './errors.js'
import { escapeId } from './identifiers.js'
import { resolveType } from './type-resolver.js'

export const REQUEST_ARROW = '-> '

export const NOTIFY_ARROW = '<- '

/** Marks the PROGRESS update message as repeatable */
export const REPEAT_MARKER = '*'

/** Marks an operation that supports replay */
export const REPLAY_MARKER = '*'

/**
 * Write one message group
 *
 * Continuation groups start on their own line, one level deeper than the
 * operation. The first group stays on the operation line unless an INLINE
 * stage comment has to precede it.
 */
export function writeMessage(
  ctx: RenderContext,
  message: Message,
  options: { arrow?: string; continuation?: boolean } = {}
): void {
  const { writer } = ctx
  const { arrow = '', continuation = false } = options
  const inline = ctx.docType === 'INLINE'
  const stageDoc = inline && hasText(message.comment)

  if (continuation || stageDoc) {
    writer.writeLine()
    if (stageDoc) {
      writeDoc(ctx, message.comment)
    }
    writer.writeIndent()
  } else {
    writer.write(' ')
  }
  writer.write(arrow, '(')

  const multiline = inline && message.fields.some((field) => hasText(field.comment))
  if (multiline) {
    writer.writeLine()
    writer.indent()
  }

  message.fields.forEach((field, index) => {
    const isLast = index === message.fields.length - 1
    if (multiline) {
      writeDoc(ctx, field.comment)
      writer.writeIndent()
    }
    writer.write(escapeId(field.name), ': ', resolveType(field.type, ctx, field.nullable))
    if (!isLast) {
      writer.write(multiline ? ',' : ', ')
    }
    if (multiline) {
      writer.writeLine()
    }
  })

  if (multiline) {
    writer.outdent()
    writer.writeIndent()
  }
  writer.write(')')
}

function writeMessages(ctx: RenderContext, op: Operation): void {
  const next = { arrow: REQUEST_ARROW, continuation: true }

  switch (op.pattern) {
    case 'SEND':
    case 'SUBMIT':
      writeMessage(ctx, op.messages[0])
      return
    case 'REQUEST':
      writeMessage(ctx, op.messages[0])
      writeMessage(ctx, op.messages[1], next)
      return
    case 'INVOKE':
      writeMessage(ctx, op.messages[0])
      writeMessage(ctx, op.messages[1], next)
      writeMessage(ctx, op.messages[2], next)
      return
    case 'PROGRESS':
      writeMessage(ctx, op.messages[0])
      writeMessage(ctx, op.messages[1], next)
      writeMessage(ctx, op.messages[2], next)
      ctx.writer.write(REPEAT_MARKER)
      writeMessage(ctx, op.messages[3], next)
      return
    case 'PUBSUB':
      writeMessage(ctx, op.messages[0], { arrow: NOTIFY_ARROW })
      return
  }
}

/**
 * Write the type carried by an error
 *
 * @param expanded - Put a documented extra information type on its own
 *   lines, preceded by its comment
 */
export function writeErrorExtraInfo(ctx: RenderContext, error: ErrorView, expanded: boolean): void {
  const { writer } = ctx
  if (error.extraInfoType === undefined) {
    return
  }

  if (expanded && hasText(error.extraInfoComment)) {
    writer.write(':')
    writer.writeLine()
    writer.indent()
    writeDoc(ctx, error.extraInfoComment)
    writer.writeIndent()
    writer.write(resolveType(error.extraInfoType, ctx))
    writer.outdent()
  } else {
    writer.write(': ', resolveType(error.extraInfoType, ctx))
  }
}

function writeThrows(ctx: RenderContext, errors: ErrorView[]): void {
  const { writer } = ctx
  const inline = ctx.docType === 'INLINE'

  writer.writeLine()
  writer.writeIndent()
  writer.write('throws')

  if (inline && errors.some(hasErrorDoc)) {
    writer.indent()
    writer.writeLine()
    errors.forEach((error, index) => {
      writeDoc(ctx, error.comment)
      writer.writeIndent()
      writer.write(error.label)
      writeErrorExtraInfo(ctx, error, true)
      if (index < errors.length - 1) {
        writer.write(',')
        writer.writeLine()
      }
    })
    writer.outdent()
    return
  }

  writer.write(' ')
  errors.forEach((error, index) => {
    writer.write(error.label)
    writeErrorExtraInfo(ctx, error, false)
    if (index < errors.length - 1) {
      writer.write(', ')
    }
  })
}

/**
 * Write an operation, its documentation and its `throws` clause, followed
 * by a blank line
 */
export function writeOperation(ctx: RenderContext, op: Operation): void {
  const { writer } = ctx
  const errors = getOperationErrors(op).map((error) => describeError(error, ctx))

  writeOperationDoc(ctx, op, errors)

  writer.writeIndent()
  writer.write(op.pattern.toLowerCase(), ' ')
  if (op.supportInReplay) {
    writer.write(REPLAY_MARKER)
  }
  writer.write(escapeId(op.name), ' [', op.number, ']')

  writer.indent()
  writeMessages(ctx, op)
  if (errors.length > 0) {
    writeThrows(ctx, errors)
  }
  writer.outdent()

  writer.writeLine()
  writer.writeLine()
}
