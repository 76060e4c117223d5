/**
 * Error Module
 *
 * Error classes, pre-built factories and error code definitions.
 */

export { Errors } from './factories.js'
export { MosdlError, GenerationError, SpecParseError } from './mosdl-error.js'

export {
  ErrorCodes,
  type ErrorCode,
  type ErrorCodeDef,
  getErrorCode,
  getExitCodeForCode,
} from './codes.js'
