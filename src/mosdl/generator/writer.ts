/**
 * Indentation-aware text writer
 */

/**
 * Anything text can be appended to
 */
export interface TextOutput {
  write(chunk: string): void
}

type Text = string | number

/**
 * Writes lines prefixed with one tab per indent level
 */
export class IndentWriter {
  private depth = 0

  constructor(
    private readonly out: TextOutput,
    private readonly newline = '\n',
    private readonly unit = '\t'
  ) {}

  /** Current indent level */
  get level(): number {
    return this.depth
  }

  indent(): void {
    this.depth++
  }

  outdent(): void {
    if (this.depth > 0) {
      this.depth--
    }
  }

  write(...text: Text[]): void {
    for (const chunk of text) {
      this.out.write(String(chunk))
    }
  }

  writeIndent(): void {
    if (this.depth > 0) {
      this.out.write(this.unit.repeat(this.depth))
    }
  }

  /**
   * Write an indented line. Without arguments only the line break is written.
   */
  writeLine(...text: Text[]): void {
    if (text.length > 0) {
      this.writeIndent()
      this.write(...text)
    }
    this.out.write(this.newline)
  }
}
