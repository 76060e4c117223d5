/**
 * Specification Builder Module
 *
 * Provides a fluent API for building service specifications programmatically.
 */

export { MOSDL, specification, SpecificationBuilder, AreaBuilder, ServiceBuilder, CapabilityBuilder } from './document.js'

export { Op, send, submit, request, invoke, progress, pubsub } from './operations.js'
export type { OperationOptions, ThrowingOperationOptions } from './operations.js'

export {
  typeRef,
  malType,
  listOf,
  field,
  message,
  toMessage,
  composite,
  enumeration,
  attribute,
  fundamental,
  extraInfo,
  errorDef,
  errorRef,
} from './elements.js'
export type { MessageInput } from './elements.js'
