import { describe, expect, it } from "vitest"
import { OutboundQueue } from "../../src/protocol/outboundQueue.js"

describe("OutboundQueue", () => {
  it("is not rate limited when idle", () => {
    const queue = new OutboundQueue({ minIntervalMs: 1_000 })
    const { item, rateLimited } = queue.push("first", 0)
    expect(rateLimited).toBe(false)
    expect(item).toEqual({ id: 1, text: "first", enqueuedAt: 0, attempts: 0 })
    expect(queue.delayUntilNext(0)).toBe(0)
  })

  it("reports the remaining interval after an attempt", () => {
    const queue = new OutboundQueue({ minIntervalMs: 1_000 })
    const { item } = queue.push("first", 0)
    queue.noteAttempt(0)
    queue.markSent(item.id)
    expect(queue.delayUntilNext(400)).toBe(600)
    expect(queue.push("second", 400).rateLimited).toBe(true)
    expect(queue.delayUntilNext(1_000)).toBe(0)
  })

  it("flags a push behind queued items as rate limited", () => {
    const queue = new OutboundQueue({ minIntervalMs: 0 })
    queue.push("a", 0)
    expect(queue.push("b", 0).rateLimited).toBe(true)
    expect(queue.size).toBe(2)
  })

  it("only removes the head on markSent", () => {
    const queue = new OutboundQueue()
    const first = queue.push("a", 0).item
    const second = queue.push("b", 0).item
    expect(queue.markSent(second.id)).toBeUndefined()
    expect(queue.markSent(first.id)).toBe(first)
    expect(queue.peek()).toBe(second)
  })

  it("drops an item once it runs out of attempts", () => {
    const queue = new OutboundQueue({ maxAttempts: 2 })
    const { item } = queue.push("flaky", 0)
    expect(queue.markFailed(item.id)).toBeUndefined()
    expect(queue.size).toBe(1)
    expect(queue.markFailed(item.id)).toEqual({ id: 1, text: "flaky", enqueuedAt: 0, attempts: 2 })
    expect(queue.size).toBe(0)
  })

  it("drains everything in order", () => {
    const queue = new OutboundQueue()
    queue.push("a", 0)
    queue.push("b", 1)
    expect(queue.drain().map((item) => item.text)).toEqual(["a", "b"])
    expect(queue.size).toBe(0)
  })
})
