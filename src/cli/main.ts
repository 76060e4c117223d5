#!/usr/bin/env node
/**
 * MOSDL Generator CLI entry point
 */

import { run } from './index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('cli')

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    logger.fatal({ err }, 'Unexpected failure')
    process.exitCode = 1
  }
)
