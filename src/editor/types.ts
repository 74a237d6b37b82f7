export type Mode = "normal" | "insert"

/** Pending first key of a two-key Normal-mode command (`yy`, `dd`). */
export type PendingPrefix = "none" | "y" | "d"

export type KeyEvent =
  | { readonly kind: "char"; readonly char: string }
  | { readonly kind: "escape" }
  | { readonly kind: "enter" }
  | { readonly kind: "backspace" }
  | { readonly kind: "left" }
  | { readonly kind: "right" }
  | { readonly kind: "up" }
  | { readonly kind: "down" }
  | { readonly kind: "home" }
  | { readonly kind: "end" }
  | { readonly kind: "interrupt" }

export type RejectionReason = "unsupported-character" | "unmapped-key"

export type EditorOutcome =
  | { readonly kind: "changed" }
  | { readonly kind: "noop" }
  | { readonly kind: "rejected"; readonly reason: RejectionReason }
  | { readonly kind: "submit"; readonly text: string }
  | { readonly kind: "quit" }

export interface BufferSnapshot {
  readonly text: string
  readonly cursor: number
}

export interface EditorSnapshot extends BufferSnapshot {
  readonly mode: Mode
  readonly pending: PendingPrefix
  readonly register: string | null
}

export const MIN_PRINTABLE = 0x20
export const MAX_PRINTABLE = 0x7e

export const isSupportedChar = (value: string): boolean => {
  if (value.length !== 1) return false
  const code = value.charCodeAt(0)
  return code >= MIN_PRINTABLE && code <= MAX_PRINTABLE
}
