import { describe, expect, it } from "vitest"
import { LineDecoder } from "../../src/protocol/transport.js"

describe("LineDecoder", () => {
  it("splits CRLF lines and holds the partial tail", () => {
    const decoder = new LineDecoder()
    expect(decoder.push("PING :a\r\nPRIVMSG #r")).toEqual(["PING :a"])
    expect(decoder.push("oom :hi\r")).toEqual([])
    expect(decoder.push("\n")).toEqual(["PRIVMSG #room :hi"])
  })

  it("accepts bare LF and skips empty lines", () => {
    const decoder = new LineDecoder()
    expect(decoder.push("one\n\r\ntwo\n")).toEqual(["one", "two"])
  })

  it("forgets the tail on reset", () => {
    const decoder = new LineDecoder()
    decoder.push("half")
    decoder.reset()
    expect(decoder.push("whole\r\n")).toEqual(["whole"])
  })
})
