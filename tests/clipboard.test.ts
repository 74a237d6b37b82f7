import { describe, expect, it } from "vitest"
import { ModalInputMachine } from "../src/editor/modalMachine.js"
import { Register } from "../src/editor/register.js"
import { mirrorToClipboard, readFakeClipboard } from "../src/util/clipboard.js"

describe("clipboard mirror", () => {
  it("copies yanked lines to the clipboard when the register mirrors to it", () => {
    const machine = new ModalInputMachine({ register: new Register(mirrorToClipboard) })
    for (const char of "icopy me") machine.dispatch({ kind: "char", char })
    machine.dispatch({ kind: "escape" })
    machine.dispatch({ kind: "char", char: "y" })
    machine.dispatch({ kind: "char", char: "y" })

    expect(readFakeClipboard()).toBe("copy me")
    expect(machine.snapshot().text).toBe("copy me")
  })
})
