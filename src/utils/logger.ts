/**
 * Logger Utility
 *
 * Logger using pino with pretty-print in development. Logs go to stderr so
 * generated MOSDL can be piped from stdout.
 */

import pino from 'pino'

const isDev = process.env.NODE_ENV !== 'production'

/**
 * Base logger instance
 */
const baseLogger = isDev
  ? pino({
      level: process.env.LOG_LEVEL ?? 'info',
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino({ level: process.env.LOG_LEVEL ?? 'info' }, pino.destination(2))

/**
 * Create a child logger with a component name
 */
export function createLogger(component: string): pino.Logger {
  return baseLogger.child({ component })
}

/**
 * Get the base logger
 */
export function getLogger(): pino.Logger {
  return baseLogger
}
