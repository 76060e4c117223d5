/**
 * In-memory sink
 */

import type { OutputSink, OutputUnit } from './types.js'

/**
 * Collects text in memory
 */
export class StringUnit implements OutputUnit {
  private chunks: string[] = []

  constructor(private readonly onClose?: (text: string) => void) {}

  write(chunk: string): void {
    this.chunks.push(chunk)
  }

  toString(): string {
    return this.chunks.join('')
  }

  close(): void {
    this.onClose?.(this.toString())
  }
}

/**
 * Keeps every closed unit in a map keyed by unit name
 */
export class MemorySink implements OutputSink {
  readonly units = new Map<string, string>()

  open(name: string): OutputUnit {
    return new StringUnit((text) => {
      this.units.set(name, text)
    })
  }

  get(name: string): string | undefined {
    return this.units.get(name)
  }

  describe(): string {
    return 'memory'
  }
}
