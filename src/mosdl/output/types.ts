/**
 * Output destinations for generated MOSDL
 */

import type { TextOutput } from '../generator/writer.js'

/**
 * One generated unit (one area). Must be closed on every exit path.
 */
export interface OutputUnit extends TextOutput {
  /** Flush pending text and release the unit */
  close(): void
}

/**
 * Destination opening one output unit per area
 */
export interface OutputSink {
  /** Open a unit; throws when it cannot be created */
  open(name: string): OutputUnit
  /** Human readable destination, used in logs */
  describe(): string
}
