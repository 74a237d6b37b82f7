import { describe, expect, it } from "vitest"
import { ModalInputMachine } from "../../src/editor/modalMachine.js"
import type { EditorOutcome, KeyEvent } from "../../src/editor/types.js"

const char = (value: string): KeyEvent => ({ kind: "char", char: value })
const keys = (sequence: string): KeyEvent[] => Array.from(sequence).map(char)

const run = (machine: ModalInputMachine, events: readonly KeyEvent[]): EditorOutcome[] =>
  events.map((event) => machine.dispatch(event))

const machineWith = (text: string): ModalInputMachine => {
  const machine = new ModalInputMachine()
  run(machine, [char("i"), ...keys(text), { kind: "escape" }])
  return machine
}

describe("ModalInputMachine", () => {
  it("starts in normal mode with no pending prefix", () => {
    const machine = new ModalInputMachine()
    expect(machine.snapshot()).toEqual({ text: "", cursor: 0, mode: "normal", pending: "none", register: null })
  })

  it("submits typed text and clears the composer", () => {
    const machine = new ModalInputMachine()
    const outcomes = run(machine, [...keys("ihi"), { kind: "enter" }])
    expect(outcomes[3]).toEqual({ kind: "submit", text: "hi" })
    expect(machine.snapshot()).toMatchObject({ text: "", cursor: 0, mode: "insert" })
  })

  it("submits from normal mode exactly once with the pre-submit content", () => {
    const machine = machineWith("hello")
    const outcomes = run(machine, [{ kind: "enter" }, { kind: "enter" }])
    expect(outcomes).toEqual([{ kind: "submit", text: "hello" }, { kind: "noop" }])
    expect(machine.snapshot()).toMatchObject({ text: "", cursor: 0, mode: "normal" })
  })

  it("rejects an unmapped normal-mode key without touching the buffer", () => {
    const machine = new ModalInputMachine()
    const outcomes = run(machine, [...keys("iabc"), { kind: "escape" }, char("^"), char("x")])
    expect(outcomes[outcomes.length - 1]).toEqual({ kind: "rejected", reason: "unmapped-key" })
    expect(machine.snapshot()).toMatchObject({ text: "abc", cursor: 0, mode: "normal" })
  })

  it("yanks an empty line then deletes it without error", () => {
    const machine = new ModalInputMachine()
    const outcomes = run(machine, keys("yydd"))
    expect(outcomes.every((outcome) => outcome.kind === "changed")).toBe(true)
    expect(machine.snapshot()).toEqual({ text: "", cursor: 0, mode: "normal", pending: "none", register: "" })
  })

  it("keeps the content at the time of dd in the register", () => {
    const machine = machineWith("one")
    run(machine, [...keys("yy"), ...keys("A")])
    run(machine, [...keys("i two"), { kind: "escape" }])
    run(machine, keys("dd"))
    expect(machine.register.read()).toBe("one two")
    expect(machine.snapshot()).toMatchObject({ text: "", cursor: 0 })
  })

  it("reprocesses the key that cancels a pending prefix", () => {
    const fresh = machineWith("abc")
    const prefixed = machineWith("abc")
    expect(prefixed.dispatch(char("d"))).toEqual({ kind: "changed" })
    expect(prefixed.pending).toBe("d")

    expect(prefixed.dispatch(char("h"))).toEqual(fresh.dispatch(char("h")))
    expect(prefixed.snapshot()).toEqual(fresh.snapshot())
    expect(prefixed.snapshot()).toMatchObject({ text: "abc", cursor: 2, pending: "none" })
  })

  it("switches prefixes when the other compound key follows", () => {
    const machine = machineWith("abc")
    run(machine, keys("y"))
    expect(machine.dispatch(char("d"))).toEqual({ kind: "changed" })
    expect(machine.pending).toBe("d")
    expect(machine.register.read()).toBeNull()
  })

  it("enters insert mode when i cancels a prefix", () => {
    const machine = machineWith("abc")
    run(machine, keys("yi"))
    expect(machine.snapshot()).toMatchObject({ mode: "insert", pending: "none", register: null })
  })

  it("leaves content unchanged and the cursor in bounds for navigation-only keys", () => {
    const machine = machineWith("nav")
    const navigation: KeyEvent[] = [
      ...keys("hhhhllll$^jk"),
      { kind: "left" },
      { kind: "right" },
      { kind: "up" },
      { kind: "down" },
      { kind: "home" },
      { kind: "end" },
      { kind: "right" },
    ]
    for (const event of navigation) {
      machine.dispatch(event)
      const { text, cursor } = machine.snapshot()
      expect(text).toBe("nav")
      expect(cursor).toBeGreaterThanOrEqual(0)
      expect(cursor).toBeLessThanOrEqual(3)
    }
    expect(machine.snapshot().cursor).toBe(3)
  })

  it("treats j and k as no-ops", () => {
    const machine = machineWith("ab")
    expect(run(machine, keys("jk"))).toEqual([{ kind: "noop" }, { kind: "noop" }])
  })

  it("rejects unsupported characters in insert mode", () => {
    const machine = new ModalInputMachine()
    run(machine, keys("i"))
    expect(machine.dispatch(char("\t"))).toEqual({ kind: "rejected", reason: "unsupported-character" })
    expect(machine.dispatch(char("ü"))).toEqual({ kind: "rejected", reason: "unsupported-character" })
    expect(machine.snapshot()).toMatchObject({ text: "", mode: "insert" })
  })

  it("edits with backspace and arrows in insert mode", () => {
    const machine = new ModalInputMachine()
    run(machine, [...keys("iacx"), { kind: "backspace" }, { kind: "left" }, char("b"), { kind: "end" }, char("d")])
    expect(machine.snapshot()).toMatchObject({ text: "abcd", cursor: 4, mode: "insert" })
  })

  it("pastes the register before the cursor with P", () => {
    const machine = machineWith("hey")
    run(machine, keys("yy^P"))
    expect(machine.snapshot()).toMatchObject({ text: "heyhey", cursor: 3, mode: "normal" })
  })

  it("treats P as a no-op when the register holds nothing", () => {
    const machine = new ModalInputMachine()
    expect(machine.dispatch(char("P"))).toEqual({ kind: "noop" })
    run(machine, keys("yy"))
    expect(machine.register.read()).toBe("")
    expect(machine.dispatch(char("P"))).toEqual({ kind: "noop" })
  })

  it("quits on interrupt from either mode and drops a pending prefix", () => {
    const machine = machineWith("abc")
    run(machine, keys("y"))
    expect(machine.dispatch({ kind: "interrupt" })).toEqual({ kind: "quit" })
    expect(machine.pending).toBe("none")
    run(machine, keys("i"))
    expect(machine.dispatch({ kind: "interrupt" })).toEqual({ kind: "quit" })
  })
})
