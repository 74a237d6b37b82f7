export interface OutboundItem {
  readonly id: number
  readonly text: string
  readonly enqueuedAt: number
  attempts: number
}

export interface OutboundQueueOptions {
  readonly minIntervalMs: number
  readonly maxAttempts: number
}

export const DEFAULT_MIN_SEND_INTERVAL_MS = 1_500
export const DEFAULT_MAX_SEND_ATTEMPTS = 3

/**
 * FIFO hand-off between the input path (producer) and the session's drain loop (consumer).
 * Items leave the queue only once written or after exhausting their attempts, so a reconnect
 * never reorders or drops what was already queued.
 */
export class OutboundQueue {
  private readonly items: OutboundItem[] = []
  private lastSentAt = Number.NEGATIVE_INFINITY
  private nextId = 1
  private readonly options: OutboundQueueOptions

  constructor(options: Partial<OutboundQueueOptions> = {}) {
    this.options = {
      minIntervalMs: Math.max(0, options.minIntervalMs ?? DEFAULT_MIN_SEND_INTERVAL_MS),
      maxAttempts: Math.max(1, options.maxAttempts ?? DEFAULT_MAX_SEND_ATTEMPTS),
    }
  }

  get size(): number {
    return this.items.length
  }

  get minIntervalMs(): number {
    return this.options.minIntervalMs
  }

  push(text: string, now: number): { item: OutboundItem; rateLimited: boolean } {
    const rateLimited = this.items.length > 0 || this.delayUntilNext(now) > 0
    const item: OutboundItem = { id: this.nextId, text, enqueuedAt: now, attempts: 0 }
    this.nextId += 1
    this.items.push(item)
    return { item, rateLimited }
  }

  peek(): OutboundItem | undefined {
    return this.items[0]
  }

  delayUntilNext(now: number): number {
    return Math.max(0, this.lastSentAt + this.options.minIntervalMs - now)
  }

  /** Records a write attempt; the interval is measured between attempts. */
  noteAttempt(now: number): void {
    this.lastSentAt = now
  }

  markSent(id: number): OutboundItem | undefined {
    const head = this.items[0]
    if (!head || head.id !== id) return undefined
    this.items.shift()
    return head
  }

  /** Returns the item when it has used up its attempts and was dropped. */
  markFailed(id: number): OutboundItem | undefined {
    const index = this.items.findIndex((item) => item.id === id)
    if (index === -1) return undefined
    const item = this.items[index]
    item.attempts += 1
    if (item.attempts < this.options.maxAttempts) return undefined
    this.items.splice(index, 1)
    return item
  }

  drain(): OutboundItem[] {
    return this.items.splice(0, this.items.length)
  }
}
