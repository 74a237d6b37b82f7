import { describe, expect, it } from "vitest"
import { decodeInkInput, type KeyFlags } from "../../src/editor/keymap.js"

const NO_FLAGS: KeyFlags = {
  upArrow: false,
  downArrow: false,
  leftArrow: false,
  rightArrow: false,
  return: false,
  escape: false,
  ctrl: false,
  meta: false,
  tab: false,
  backspace: false,
  delete: false,
}

const flags = (overrides: Partial<KeyFlags>): KeyFlags => ({ ...NO_FLAGS, ...overrides })

describe("decodeInkInput", () => {
  it("splits typed input into one char event per character", () => {
    expect(decodeInkInput("hi", NO_FLAGS)).toEqual([
      { kind: "char", char: "h" },
      { kind: "char", char: "i" },
    ])
  })

  it("maps ctrl+c and ctrl+q to interrupt", () => {
    expect(decodeInkInput("c", flags({ ctrl: true }))).toEqual([{ kind: "interrupt" }])
    expect(decodeInkInput("q", flags({ ctrl: true }))).toEqual([{ kind: "interrupt" }])
  })

  it("drops other control chords", () => {
    expect(decodeInkInput("x", flags({ ctrl: true }))).toEqual([])
    expect(decodeInkInput("b", flags({ meta: true }))).toEqual([])
  })

  it("maps named keys", () => {
    expect(decodeInkInput("", flags({ escape: true }))).toEqual([{ kind: "escape" }])
    expect(decodeInkInput("\r", flags({ return: true }))).toEqual([{ kind: "enter" }])
    expect(decodeInkInput("", flags({ backspace: true }))).toEqual([{ kind: "backspace" }])
    expect(decodeInkInput("", flags({ delete: true }))).toEqual([{ kind: "backspace" }])
    expect(decodeInkInput("", flags({ leftArrow: true }))).toEqual([{ kind: "left" }])
    expect(decodeInkInput("", flags({ rightArrow: true }))).toEqual([{ kind: "right" }])
    expect(decodeInkInput("", flags({ upArrow: true }))).toEqual([{ kind: "up" }])
    expect(decodeInkInput("", flags({ downArrow: true }))).toEqual([{ kind: "down" }])
  })

  it("recognizes home and end sequences", () => {
    expect(decodeInkInput("\u001b[H", NO_FLAGS)).toEqual([{ kind: "home" }])
    expect(decodeInkInput("[H", flags({ meta: true }))).toEqual([{ kind: "home" }])
    expect(decodeInkInput("OH", flags({ escape: true }))).toEqual([{ kind: "home" }])
    expect(decodeInkInput("[F", flags({ meta: true }))).toEqual([{ kind: "end" }])
    expect(decodeInkInput("[4~", flags({ meta: true }))).toEqual([{ kind: "end" }])
  })

  it("treats escape-less sequence lookalikes as typed text", () => {
    expect(decodeInkInput("OH", NO_FLAGS)).toEqual([
      { kind: "char", char: "O" },
      { kind: "char", char: "H" },
    ])
    expect(decodeInkInput("[F", NO_FLAGS)).toEqual([
      { kind: "char", char: "[" },
      { kind: "char", char: "F" },
    ])
  })

  it("passes tab through as a char so the editor can reject it", () => {
    expect(decodeInkInput("\t", flags({ tab: true }))).toEqual([{ kind: "char", char: "\t" }])
  })
})
