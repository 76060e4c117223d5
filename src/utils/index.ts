/**
 * MOSDL Generator Utilities
 */

// Logger
export { createLogger, getLogger } from './logger.js'
