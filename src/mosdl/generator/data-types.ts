/**
 * Data type and error declarations
 */

import { isAbstractComposite, type DataType, type ErrorDefinition } from '../spec/types.js'
import type { RenderContext } from './context.js'
import { writeDoc } from './docs.js'
import { describeDefinition } from './errors.js'
import { escapeId } from './identifiers.js'
import { writeErrorExtraInfo } from './operations.js'
import { resolveType } from './type-resolver.js'

/**
 * Write a composite, enumeration, attribute or fundamental declaration
 */
export function writeDataType(ctx: RenderContext, dataType: DataType): void {
  const { writer } = ctx
  writeDoc(ctx, dataType.comment)

  switch (dataType.kind) {
    case 'composite': {
      const isAbstract = isAbstractComposite(dataType)
      writer.writeIndent()
      if (isAbstract) {
        writer.write('abstract ')
      }
      writer.write('composite ', escapeId(dataType.name))
      if (!isAbstract && dataType.shortFormPart !== undefined) {
        writer.write(' [', dataType.shortFormPart, ']')
        if (dataType.extends) {
          writer.write(' extends ', resolveType(dataType.extends, ctx))
        }
      }
      writer.write(' {')
      writer.writeLine()
      writer.indent()
      for (const field of dataType.fields) {
        writeDoc(ctx, field.comment)
        writer.writeLine(escapeId(field.name), ': ', resolveType(field.type, ctx, field.nullable))
      }
      writer.outdent()
      writer.writeLine('}')
      return
    }

    case 'enumeration':
      writer.writeLine('enum ', escapeId(dataType.name), ' [', dataType.shortFormPart, '] {')
      writer.indent()
      for (const item of dataType.items) {
        writeDoc(ctx, item.comment)
        writer.writeLine(escapeId(item.value), ' [', item.nvalue, ']')
      }
      writer.outdent()
      writer.writeLine('}')
      return

    case 'attribute':
      writer.writeLine('attribute ', escapeId(dataType.name), ' [', dataType.shortFormPart, ']')
      return

    case 'fundamental': {
      const extension = dataType.extends ? ` extends ${resolveType(dataType.extends, ctx)}` : ''
      writer.writeLine('fundamental ', escapeId(dataType.name), extension)
      return
    }
  }
}

/**
 * Write data types, each followed by a blank line
 */
export function writeDataTypes(ctx: RenderContext, dataTypes: DataType[] | undefined): void {
  for (const dataType of dataTypes ?? []) {
    writeDataType(ctx, dataType)
    ctx.writer.writeLine()
  }
}

/**
 * Write area or service level error definitions, each followed by a blank line
 *
 * Documented extra information is expanded whenever documentation is shown.
 */
export function writeErrors(ctx: RenderContext, errors: ErrorDefinition[] | undefined): void {
  const { writer } = ctx
  for (const error of errors ?? []) {
    const view = describeDefinition(error)
    writeDoc(ctx, view.comment)
    writer.writeIndent()
    writer.write(view.label)
    writeErrorExtraInfo(ctx, view, ctx.docType !== 'SUPPRESS')
    writer.writeLine()
    writer.writeLine()
  }
}
