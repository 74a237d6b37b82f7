import type { ChatMessage } from "../protocol/types.js"

export const DEFAULT_HISTORY_LIMIT = 500

/**
 * Bounded scrollback backed by a ring buffer. The inbound path is the only writer; renderers read
 * `snapshot()`, which is frozen and reused until the next append.
 */
export class ChatHistory {
  private readonly slots: Array<ChatMessage | undefined>
  private start = 0
  private count = 0
  private versionValue = 0
  private cached: readonly ChatMessage[] | null = null

  constructor(readonly capacity: number = DEFAULT_HISTORY_LIMIT) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer (got ${capacity}).`)
    }
    this.slots = new Array<ChatMessage | undefined>(capacity)
  }

  get size(): number {
    return this.count
  }

  /** Bumps on every append; lets a renderer skip frames with no new messages. */
  get version(): number {
    return this.versionValue
  }

  append(message: ChatMessage): void {
    if (this.count < this.capacity) {
      this.slots[(this.start + this.count) % this.capacity] = message
      this.count += 1
    } else {
      this.slots[this.start] = message
      this.start = (this.start + 1) % this.capacity
    }
    this.versionValue += 1
    this.cached = null
  }

  snapshot(): readonly ChatMessage[] {
    if (this.cached) return this.cached
    const ordered: ChatMessage[] = []
    for (let offset = 0; offset < this.count; offset += 1) {
      const message = this.slots[(this.start + offset) % this.capacity]
      if (message) ordered.push(message)
    }
    this.cached = Object.freeze(ordered)
    return this.cached
  }
}
