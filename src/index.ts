/**
 * MOSDL Generator
 *
 * Renders MO service specifications as MOSDL text.
 */

export * from './mosdl/index.js'

// Configuration
export { loadConfig, GeneratorConfigSchema, DOC_TYPES } from './config.js'
export type { DocType, GeneratorConfig, GeneratorConfigInput } from './config.js'

// Errors
export {
  Errors,
  MosdlError,
  GenerationError,
  SpecParseError,
  ErrorCodes,
  getErrorCode,
  getExitCodeForCode,
} from './errors/index.js'
export type { ErrorCode, ErrorCodeDef } from './errors/index.js'

// Utilities
export { createLogger, getLogger } from './utils/index.js'
