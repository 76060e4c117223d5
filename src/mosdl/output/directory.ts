/**
 * Directory sink: one UTF-8 file per unit
 */

import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs'
import { join } from 'node:path'
import type { OutputSink, OutputUnit } from './types.js'

class FileUnit implements OutputUnit {
  private chunks: string[] = []
  private closed = false

  constructor(private readonly fd: number) {}

  write(chunk: string): void {
    if (this.closed) {
      throw new Error('Output unit is closed')
    }
    this.chunks.push(chunk)
  }

  close(): void {
    if (this.closed) {
      return
    }
    this.closed = true
    try {
      writeSync(this.fd, this.chunks.join(''), null, 'utf8')
    } finally {
      this.chunks = []
      closeSync(this.fd)
    }
  }
}

/**
 * Writes each unit to `<directory>/<name>`, creating the directory on demand.
 * Text is buffered and written when the unit is closed.
 */
export class DirectorySink implements OutputSink {
  constructor(public readonly directory: string) {}

  open(name: string): OutputUnit {
    mkdirSync(this.directory, { recursive: true })
    return new FileUnit(openSync(join(this.directory, name), 'w'))
  }

  describe(): string {
    return this.directory
  }
}
