/**
 * MO Service Specification Types
 *
 * In-memory model of a service specification: areas containing services,
 * capability sets, operations, data types and errors. The generator only
 * reads these structures.
 */

// =============================================================================
// Specification & Areas
// =============================================================================

/**
 * Root of a service specification
 */
export interface Specification {
  /** Areas in document order, each rendered to its own output unit */
  areas: Area[]
}

export interface Area {
  name: string
  /** Numeric area identifier */
  number: number
  /** Area version, omitted from the header when 1 */
  version: number
  comment?: string
  services: Service[]
  dataTypes?: DataType[]
  errors?: ErrorDefinition[]
}

export interface Service {
  name: string
  number: number
  comment?: string
  capabilitySets: CapabilitySet[]
  dataTypes?: DataType[]
  errors?: ErrorDefinition[]
}

export interface CapabilitySet {
  /** A capability set may be declared without an explicit id */
  number?: number
  comment?: string
  operations: Operation[]
}

// =============================================================================
// Type References & Fields
// =============================================================================

/**
 * Reference to a data type, resolved against the area/service being rendered
 */
export interface TypeReference {
  area: string
  service?: string
  name: string
  list?: boolean
}

/**
 * Named, typed element of a message or composite
 */
export interface Field {
  name: string
  type: TypeReference
  /** Whether the field may be null (rendered as `?`) */
  nullable?: boolean
  comment?: string
}

// =============================================================================
// Operations
// =============================================================================

/**
 * MAL interaction patterns
 */
export type InteractionPattern = 'SEND' | 'SUBMIT' | 'REQUEST' | 'INVOKE' | 'PROGRESS' | 'PUBSUB'

/**
 * MAL interaction stages
 */
export type InteractionStage =
  | 'SEND'
  | 'SUBMIT'
  | 'SUBMIT_ACK'
  | 'SUBMIT_ACK_ERROR'
  | 'REQUEST'
  | 'REQUEST_RESPONSE'
  | 'REQUEST_RESPONSE_ERROR'
  | 'INVOKE'
  | 'INVOKE_ACK'
  | 'INVOKE_ACK_ERROR'
  | 'INVOKE_RESPONSE'
  | 'INVOKE_RESPONSE_ERROR'
  | 'PROGRESS'
  | 'PROGRESS_ACK'
  | 'PROGRESS_ACK_ERROR'
  | 'PROGRESS_UPDATE'
  | 'PROGRESS_UPDATE_ERROR'
  | 'PROGRESS_RESPONSE'
  | 'PROGRESS_RESPONSE_ERROR'
  | 'PUBSUB_REGISTER'
  | 'PUBSUB_REGISTER_ACK'
  | 'PUBSUB_REGISTER_ERROR'
  | 'PUBSUB_PUBLISH_REGISTER'
  | 'PUBSUB_PUBLISH_REGISTER_ACK'
  | 'PUBSUB_PUBLISH_REGISTER_ERROR'
  | 'PUBSUB_PUBLISH'
  | 'PUBSUB_PUBLISH_ERROR'
  | 'PUBSUB_NOTIFY'
  | 'PUBSUB_NOTIFY_ERROR'
  | 'PUBSUB_DEREGISTER'
  | 'PUBSUB_DEREGISTER_ACK'
  | 'PUBSUB_PUBLISH_DEREGISTER'
  | 'PUBSUB_PUBLISH_DEREGISTER_ACK'

/**
 * One message stage of an operation
 */
export interface Message {
  comment?: string
  fields: Field[]
}

interface OperationBase {
  name: string
  number: number
  comment?: string
  /** Operation may be replayed (rendered as `*` before the name) */
  supportInReplay?: boolean
}

export interface SendOperation extends OperationBase {
  pattern: 'SEND'
  messages: [send: Message]
}

export interface SubmitOperation extends OperationBase {
  pattern: 'SUBMIT'
  messages: [submit: Message]
  errors?: OperationError[]
}

export interface RequestOperation extends OperationBase {
  pattern: 'REQUEST'
  messages: [request: Message, response: Message]
  errors?: OperationError[]
}

export interface InvokeOperation extends OperationBase {
  pattern: 'INVOKE'
  messages: [invoke: Message, ack: Message, response: Message]
  errors?: OperationError[]
}

export interface ProgressOperation extends OperationBase {
  pattern: 'PROGRESS'
  messages: [progress: Message, ack: Message, update: Message, response: Message]
  errors?: OperationError[]
}

export interface PubSubOperation extends OperationBase {
  pattern: 'PUBSUB'
  messages: [publishNotify: Message]
  errors?: OperationError[]
}

export type Operation =
  | SendOperation
  | SubmitOperation
  | RequestOperation
  | InvokeOperation
  | ProgressOperation
  | PubSubOperation

// =============================================================================
// Errors
// =============================================================================

/**
 * Type carried alongside an error, optionally documented
 */
export interface ExtraInformation {
  type: TypeReference
  comment?: string
}

/**
 * A new error introduced at area, service or operation scope
 */
export interface ErrorDefinition {
  kind: 'definition'
  name: string
  number: number
  comment?: string
  extraInformation?: ExtraInformation
}

/**
 * Reuse of an error defined elsewhere, optionally narrowing its extra information
 */
export interface ErrorReference {
  kind: 'reference'
  type: TypeReference
  comment?: string
  extraInformation?: ExtraInformation
}

/**
 * Anything usable in a `throws` clause
 */
export type OperationError = ErrorDefinition | ErrorReference

// =============================================================================
// Data Types
// =============================================================================

export interface CompositeType {
  kind: 'composite'
  name: string
  /** Absent (or 0) for abstract composites */
  shortFormPart?: number
  extends?: TypeReference
  fields: Field[]
  comment?: string
}

export interface EnumerationItem {
  value: string
  nvalue: number
  comment?: string
}

export interface EnumerationType {
  kind: 'enumeration'
  name: string
  shortFormPart: number
  items: EnumerationItem[]
  comment?: string
}

export interface AttributeType {
  kind: 'attribute'
  name: string
  shortFormPart: number
  comment?: string
}

export interface FundamentalType {
  kind: 'fundamental'
  name: string
  extends?: TypeReference
  comment?: string
}

export type DataType = CompositeType | EnumerationType | AttributeType | FundamentalType

// =============================================================================
// Type Guards
// =============================================================================

export function isErrorReference(error: OperationError): error is ErrorReference {
  return error.kind === 'reference'
}

/**
 * A composite without shortform id, or with id 0, is abstract
 */
export function isAbstractComposite(composite: CompositeType): boolean {
  return composite.shortFormPart === undefined || composite.shortFormPart === 0
}

/**
 * Errors declared by an operation (SEND operations declare none)
 */
export function getOperationErrors(op: Operation): OperationError[] {
  if (op.pattern === 'SEND') {
    return []
  }
  return op.errors ?? []
}
