/**
 * MOSDL Generator Module
 */

export { generate, renderArea, writeArea, getUnitName } from './generator.js'
export type { GenerateOptions, GenerateResult } from './generator.js'
export { IndentWriter } from './writer.js'
export type { TextOutput } from './writer.js'
export type { RenderContext } from './context.js'
export { escapeId } from './identifiers.js'
export { resolveType, isMalFundamental } from './type-resolver.js'
export { describeError, describeDefinition } from './errors.js'
export type { ErrorView } from './errors.js'
export { writeDoc, buildOperationDoc, writeOperationDoc, LINE_COMMENT, BLOCK_COMMENT } from './docs.js'
export { writeOperation, writeMessage, writeErrorExtraInfo } from './operations.js'
export { writeDataType, writeDataTypes, writeErrors } from './data-types.js'
