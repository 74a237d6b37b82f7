export interface BackoffOptions {
  readonly minDelayMs: number
  readonly maxDelayMs: number
  readonly factor: number
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  minDelayMs: 1_000,
  maxDelayMs: 30_000,
  factor: 2,
}

/**
 * Exponential reconnect delay: `min(max, min * factor^(n-1))` for the n-th consecutive failure.
 * No jitter, so consecutive delays strictly increase until they reach the cap.
 */
export class Backoff {
  private failures = 0
  private readonly options: BackoffOptions

  constructor(options: Partial<BackoffOptions> = {}) {
    const merged = { ...DEFAULT_BACKOFF, ...options }
    const minDelayMs = Math.max(1, merged.minDelayMs)
    this.options = {
      minDelayMs,
      maxDelayMs: Math.max(minDelayMs, merged.maxDelayMs),
      factor: merged.factor > 1 ? merged.factor : DEFAULT_BACKOFF.factor,
    }
  }

  get attempt(): number {
    return this.failures
  }

  next(): number {
    this.failures += 1
    const { minDelayMs, maxDelayMs, factor } = this.options
    return Math.min(maxDelayMs, minDelayMs * factor ** (this.failures - 1))
  }

  reset(): void {
    this.failures = 0
  }
}
