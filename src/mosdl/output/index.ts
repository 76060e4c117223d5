/**
 * Output Module
 */

export { DirectorySink } from './directory.js'
export { MemorySink, StringUnit } from './memory.js'
export type { OutputSink, OutputUnit } from './types.js'
