/**
 * MOSDL - MO Service Description Language generator
 *
 * Renders MO service specifications as MOSDL text, one unit per area.
 *
 * @example Builder
 * ```typescript
 * import { specification, Op, field, malType, listOf } from 'mosdl-gen'
 *
 * const spec = specification()
 *   .area('test', 4711)
 *     .service('ServiceName', 1)
 *       .capability(7)
 *         .operation(Op.request('listDefinitions', 1, [], [field('definitionIds', listOf(malType('Identifier')))]))
 *       .done()
 *     .done()
 *   .done()
 *   .build()
 * ```
 *
 * @example Generator
 * ```typescript
 * import { generate, DirectorySink } from 'mosdl-gen'
 *
 * generate(spec, new DirectorySink('./out'), { docType: 'INLINE' })
 * ```
 */

// Types
export type {
  Specification,
  Area,
  Service,
  CapabilitySet,
  TypeReference,
  Field,
  InteractionPattern,
  InteractionStage,
  Message,
  Operation,
  SendOperation,
  SubmitOperation,
  RequestOperation,
  InvokeOperation,
  ProgressOperation,
  PubSubOperation,
  ExtraInformation,
  ErrorDefinition,
  ErrorReference,
  OperationError,
  CompositeType,
  EnumerationItem,
  EnumerationType,
  AttributeType,
  FundamentalType,
  DataType,
} from './spec/types.js'

export { isErrorReference, isAbstractComposite, getOperationErrors } from './spec/types.js'

// Constants
export {
  MOSDL_FILE_EXTENSION,
  MAL_AREA,
  MAL_FUNDAMENTALS,
  KEYWORDS,
  MESSAGE_STAGES,
  getStageTag,
} from './spec/defaults.js'

// Generator
export {
  generate,
  renderArea,
  writeArea,
  getUnitName,
  IndentWriter,
  escapeId,
  resolveType,
  isMalFundamental,
  describeError,
  buildOperationDoc,
} from './generator/index.js'

export type { GenerateOptions, GenerateResult, RenderContext, ErrorView, TextOutput } from './generator/index.js'

// Output
export { DirectorySink, MemorySink, StringUnit } from './output/index.js'
export type { OutputSink, OutputUnit } from './output/index.js'

// Parser
export {
  parse,
  parseFile,
  parseJson,
  parseYaml,
  detectFormat,
  detectFormatFromPath,
  mergeSpecifications,
} from './parser/index.js'
export type { SpecFormat } from './parser/index.js'

// Builder
export {
  MOSDL,
  specification,
  SpecificationBuilder,
  AreaBuilder,
  ServiceBuilder,
  CapabilityBuilder,
  Op,
  typeRef,
  malType,
  listOf,
  field,
  message,
  composite,
  enumeration,
  attribute,
  fundamental,
  extraInfo,
  errorDef,
  errorRef,
} from './builder/index.js'

export type { MessageInput, OperationOptions, ThrowingOperationOptions } from './builder/index.js'
