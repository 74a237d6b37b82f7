import { Register } from "./register.js"
import { TextBuffer } from "./textBuffer.js"
import type { EditorOutcome, EditorSnapshot, KeyEvent, Mode, PendingPrefix } from "./types.js"

const CHANGED: EditorOutcome = { kind: "changed" }
const NOOP: EditorOutcome = { kind: "noop" }
const QUIT: EditorOutcome = { kind: "quit" }

const fromMoved = (moved: boolean): EditorOutcome => (moved ? CHANGED : NOOP)

export interface ModalInputMachineOptions {
  readonly buffer?: TextBuffer
  readonly register?: Register
}

/**
 * Interprets abstract key events against the composer. Mode and the `yy`/`dd` prefix are the
 * only state kept here; the buffer and register are owned objects so the orchestrator can
 * render them without going through the machine.
 */
export class ModalInputMachine {
  readonly buffer: TextBuffer
  readonly register: Register
  private modeValue: Mode = "normal"
  private pendingValue: PendingPrefix = "none"

  constructor(options: ModalInputMachineOptions = {}) {
    this.buffer = options.buffer ?? new TextBuffer()
    this.register = options.register ?? new Register()
  }

  get mode(): Mode {
    return this.modeValue
  }

  get pending(): PendingPrefix {
    return this.pendingValue
  }

  snapshot(): EditorSnapshot {
    return {
      ...this.buffer.snapshot(),
      mode: this.modeValue,
      pending: this.pendingValue,
      register: this.register.read(),
    }
  }

  dispatch(event: KeyEvent): EditorOutcome {
    if (event.kind === "interrupt") {
      this.pendingValue = "none"
      return QUIT
    }
    if (this.modeValue === "insert") {
      return this.dispatchInsert(event)
    }
    if (this.pendingValue !== "none") {
      const prefix = this.pendingValue
      this.pendingValue = "none"
      if (event.kind === "char" && event.char === prefix) {
        return this.runCompound(prefix)
      }
      // The prefix is dropped and the key is handled as if it had arrived first.
      return this.dispatchNormal(event)
    }
    return this.dispatchNormal(event)
  }

  private runCompound(prefix: "y" | "d"): EditorOutcome {
    if (prefix === "y") {
      this.buffer.yankLine(this.register)
    } else {
      this.buffer.deleteLine(this.register)
    }
    return CHANGED
  }

  private dispatchNormal(event: KeyEvent): EditorOutcome {
    switch (event.kind) {
      case "char":
        return this.dispatchNormalChar(event.char)
      case "left":
        return fromMoved(this.buffer.moveLeft())
      case "right":
        return fromMoved(this.buffer.moveRight())
      case "home":
        return fromMoved(this.buffer.moveLineStart())
      case "end":
        return fromMoved(this.buffer.moveLineEnd())
      case "up":
        return fromMoved(this.buffer.moveUp())
      case "down":
        return fromMoved(this.buffer.moveDown())
      case "enter":
        return this.submit()
      case "escape":
      case "backspace":
        return NOOP
      default:
        return NOOP
    }
  }

  private dispatchNormalChar(char: string): EditorOutcome {
    switch (char) {
      case "i":
        this.modeValue = "insert"
        return CHANGED
      case "h":
        return fromMoved(this.buffer.moveLeft())
      case "l":
        return fromMoved(this.buffer.moveRight())
      case "j":
        return fromMoved(this.buffer.moveDown())
      case "k":
        return fromMoved(this.buffer.moveUp())
      case "$":
        return fromMoved(this.buffer.moveLineEnd())
      case "^":
        return fromMoved(this.buffer.moveLineStart())
      case "y":
      case "d":
        this.pendingValue = char
        return CHANGED
      case "P":
        return this.pasteRegister()
      default:
        return { kind: "rejected", reason: "unmapped-key" }
    }
  }

  private dispatchInsert(event: KeyEvent): EditorOutcome {
    switch (event.kind) {
      case "char":
        return this.buffer.insertChar(event.char) ? CHANGED : { kind: "rejected", reason: "unsupported-character" }
      case "escape":
        this.modeValue = "normal"
        return CHANGED
      case "backspace":
        return fromMoved(this.buffer.deleteBackward())
      case "left":
        return fromMoved(this.buffer.moveLeft())
      case "right":
        return fromMoved(this.buffer.moveRight())
      case "home":
        return fromMoved(this.buffer.moveLineStart())
      case "end":
        return fromMoved(this.buffer.moveLineEnd())
      case "enter":
        return this.submit()
      default:
        return NOOP
    }
  }

  private pasteRegister(): EditorOutcome {
    const content = this.register.read()
    if (!content) return NOOP
    return this.buffer.insertText(content) ? CHANGED : { kind: "rejected", reason: "unsupported-character" }
  }

  private submit(): EditorOutcome {
    if (this.buffer.length === 0) return NOOP
    return { kind: "submit", text: this.buffer.takeAndClear() }
  }
}
