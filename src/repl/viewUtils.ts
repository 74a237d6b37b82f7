import type { ChatMessage } from "../protocol/types.js"
import type { BufferSnapshot } from "../editor/types.js"

export const STATUS_ROWS = 2
export const COMPOSER_ROWS = 2
export const HINT_ROWS = 1
export const MIN_MESSAGE_ROWS = 3

/** Newest messages that fit in `rows`, oldest first. */
export const visibleMessages = (messages: readonly ChatMessage[], rows: number): readonly ChatMessage[] => {
  if (rows <= 0) return []
  return messages.length <= rows ? messages : messages.slice(messages.length - rows)
}

export const messageRowsFor = (terminalRows: number): number =>
  Math.max(MIN_MESSAGE_ROWS, terminalRows - STATUS_ROWS - COMPOSER_ROWS - HINT_ROWS)

/** Splits the composer around the cursor; the cursor cell is a space when it sits past the end. */
export const splitAtCursor = (composer: BufferSnapshot): { before: string; at: string; after: string } => {
  const { text, cursor } = composer
  return {
    before: text.slice(0, cursor),
    at: cursor < text.length ? text[cursor] : " ",
    after: cursor < text.length ? text.slice(cursor + 1) : "",
  }
}
