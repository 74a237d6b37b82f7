import type { KeyEvent } from "./types.js"

/** The subset of Ink's `Key` flags the decoder reads. Ink's own `Key` satisfies it. */
export interface KeyFlags {
  readonly upArrow: boolean
  readonly downArrow: boolean
  readonly leftArrow: boolean
  readonly rightArrow: boolean
  readonly return: boolean
  readonly escape: boolean
  readonly ctrl: boolean
  readonly meta: boolean
  readonly tab: boolean
  readonly backspace: boolean
  readonly delete: boolean
}

const HOME_SEQUENCES = new Set(["\u001b[H", "\u001b[1~", "\u001bOH"])
const END_SEQUENCES = new Set(["\u001b[F", "\u001b[4~", "\u001bOF"])
// Ink strips the ESC and flags the key as meta/escape; without that flag these are typed text.
const BARE_HOME_SEQUENCES = new Set(["[H", "[1~", "OH"])
const BARE_END_SEQUENCES = new Set(["[F", "[4~", "OF"])
const QUIT_CHORDS = new Set(["c", "q"])

export const decodeInkInput = (input: string, key: KeyFlags): KeyEvent[] => {
  const normalizedInput = input.toLowerCase()
  if (key.ctrl && (QUIT_CHORDS.has(normalizedInput) || input === "\u0003" || input === "\u0011")) {
    return [{ kind: "interrupt" }]
  }
  if (key.return) return [{ kind: "enter" }]
  if (key.escape && input.length === 0) return [{ kind: "escape" }]
  // Most terminals send DEL (0x7f) for the backspace key; Ink reports that as `delete`.
  if (key.backspace || (key.delete && input.length === 0)) return [{ kind: "backspace" }]
  if (key.leftArrow) return [{ kind: "left" }]
  if (key.rightArrow) return [{ kind: "right" }]
  if (key.upArrow) return [{ kind: "up" }]
  if (key.downArrow) return [{ kind: "down" }]
  const escaped = key.meta || key.escape
  if (HOME_SEQUENCES.has(input) || (escaped && BARE_HOME_SEQUENCES.has(input))) return [{ kind: "home" }]
  if (END_SEQUENCES.has(input) || (escaped && BARE_END_SEQUENCES.has(input))) return [{ kind: "end" }]
  if (key.escape) return [{ kind: "escape" }]
  if (key.tab) return [{ kind: "char", char: "\t" }]
  if (key.ctrl || key.meta) return []
  return Array.from(input).map((char): KeyEvent => ({ kind: "char", char }))
}
