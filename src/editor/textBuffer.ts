import type { Register } from "./register.js"
import { isSupportedChar, type BufferSnapshot } from "./types.js"

/**
 * Single-line composer buffer. Every position is a character boundary because only printable
 * ASCII is accepted, so the cursor is a plain index in `[0, length]`.
 */
export class TextBuffer {
  private chars: string[] = []
  private cursorIndex = 0

  get length(): number {
    return this.chars.length
  }

  get cursor(): number {
    return this.cursorIndex
  }

  get text(): string {
    return this.chars.join("")
  }

  snapshot(): BufferSnapshot {
    return { text: this.text, cursor: this.cursorIndex }
  }

  insertChar(char: string): boolean {
    if (!isSupportedChar(char)) return false
    this.chars.splice(this.cursorIndex, 0, char)
    this.cursorIndex += 1
    return true
  }

  /** Inserts a whole run or nothing. */
  insertText(text: string): boolean {
    const run = Array.from(text)
    if (run.length === 0 || !run.every(isSupportedChar)) return false
    this.chars.splice(this.cursorIndex, 0, ...run)
    this.cursorIndex += run.length
    return true
  }

  deleteBackward(): boolean {
    if (this.cursorIndex === 0) return false
    this.chars.splice(this.cursorIndex - 1, 1)
    this.cursorIndex -= 1
    return true
  }

  moveLeft(): boolean {
    if (this.cursorIndex === 0) return false
    this.cursorIndex -= 1
    return true
  }

  moveRight(): boolean {
    if (this.cursorIndex >= this.chars.length) return false
    this.cursorIndex += 1
    return true
  }

  // Single logical line: vertical motion is reserved for a multi-line composer.
  moveUp(): boolean {
    return false
  }

  moveDown(): boolean {
    return false
  }

  moveLineStart(): boolean {
    const moved = this.cursorIndex !== 0
    this.cursorIndex = 0
    return moved
  }

  moveLineEnd(): boolean {
    const moved = this.cursorIndex !== this.chars.length
    this.cursorIndex = this.chars.length
    return moved
  }

  yankLine(register: Register): void {
    register.write(this.text)
  }

  deleteLine(register: Register): void {
    register.write(this.text)
    this.reset()
  }

  takeAndClear(): string {
    const content = this.text
    this.reset()
    return content
  }

  private reset(): void {
    this.chars = []
    this.cursorIndex = 0
  }
}
