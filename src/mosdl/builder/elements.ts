/**
 * Element helpers for building specifications
 *
 * Plain factory functions for type references, fields, messages, data
 * types and errors.
 */

import { MAL_AREA } from '../spec/defaults.js'
import type {
  AttributeType,
  CompositeType,
  EnumerationItem,
  EnumerationType,
  ErrorDefinition,
  ErrorReference,
  ExtraInformation,
  Field,
  FundamentalType,
  Message,
  TypeReference,
} from '../spec/types.js'

/**
 * Reference a type of an area, or of a service when `service` is given
 */
export function typeRef(
  area: string,
  name: string,
  options?: { service?: string; list?: boolean }
): TypeReference {
  const ref: TypeReference = { area, name }
  if (options?.service) ref.service = options.service
  if (options?.list) ref.list = true
  return ref
}

/**
 * Reference a built-in MAL type
 */
export function malType(name: string, options?: { list?: boolean }): TypeReference {
  return typeRef(MAL_AREA, name, options)
}

/**
 * Turn a reference into a list reference
 */
export function listOf(ref: TypeReference): TypeReference {
  return { ...ref, list: true }
}

export function field(
  name: string,
  type: TypeReference,
  options?: { nullable?: boolean; comment?: string }
): Field {
  const result: Field = { name, type }
  if (options?.nullable) result.nullable = true
  if (options?.comment !== undefined) result.comment = options.comment
  return result
}

/**
 * Message input: a field list, or a complete message with a stage comment
 */
export type MessageInput = Field[] | Message

export function message(fields: Field[], comment?: string): Message {
  const result: Message = { fields }
  if (comment !== undefined) result.comment = comment
  return result
}

export function toMessage(input: MessageInput): Message {
  return Array.isArray(input) ? { fields: input } : input
}

// =============================================================================
// Data Types
// =============================================================================

/**
 * Create a composite; without `shortFormPart` it is abstract
 */
export function composite(
  name: string,
  options: {
    shortFormPart?: number
    extends?: TypeReference
    fields?: Field[]
    comment?: string
  } = {}
): CompositeType {
  const result: CompositeType = { kind: 'composite', name, fields: options.fields ?? [] }
  if (options.shortFormPart !== undefined) result.shortFormPart = options.shortFormPart
  if (options.extends) result.extends = options.extends
  if (options.comment !== undefined) result.comment = options.comment
  return result
}

/**
 * Create an enumeration; items given as `[value, nvalue]` pairs or full items
 */
export function enumeration(
  name: string,
  shortFormPart: number,
  items: Array<EnumerationItem | [value: string, nvalue: number]>,
  comment?: string
): EnumerationType {
  const result: EnumerationType = {
    kind: 'enumeration',
    name,
    shortFormPart,
    items: items.map((item) => (Array.isArray(item) ? { value: item[0], nvalue: item[1] } : item)),
  }
  if (comment !== undefined) result.comment = comment
  return result
}

export function attribute(name: string, shortFormPart: number, comment?: string): AttributeType {
  const result: AttributeType = { kind: 'attribute', name, shortFormPart }
  if (comment !== undefined) result.comment = comment
  return result
}

export function fundamental(
  name: string,
  options: { extends?: TypeReference; comment?: string } = {}
): FundamentalType {
  const result: FundamentalType = { kind: 'fundamental', name }
  if (options.extends) result.extends = options.extends
  if (options.comment !== undefined) result.comment = options.comment
  return result
}

// =============================================================================
// Errors
// =============================================================================

export function extraInfo(type: TypeReference, comment?: string): ExtraInformation {
  const result: ExtraInformation = { type }
  if (comment !== undefined) result.comment = comment
  return result
}

/**
 * Define a new error
 */
export function errorDef(
  name: string,
  number: number,
  options?: { extraInformation?: ExtraInformation; comment?: string }
): ErrorDefinition {
  const result: ErrorDefinition = { kind: 'definition', name, number }
  if (options?.comment !== undefined) result.comment = options.comment
  if (options?.extraInformation) result.extraInformation = options.extraInformation
  return result
}

/**
 * Reuse an error defined elsewhere
 */
export function errorRef(
  type: TypeReference,
  options?: { extraInformation?: ExtraInformation; comment?: string }
): ErrorReference {
  const result: ErrorReference = { kind: 'reference', type }
  if (options?.comment !== undefined) result.comment = options.comment
  if (options?.extraInformation) result.extraInformation = options.extraInformation
  return result
}
