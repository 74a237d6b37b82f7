import { describe, expect, it } from "vitest"
import {
  classifyFrame,
  formatCapabilityRequest,
  formatJoin,
  formatPass,
  formatPong,
  formatPrivmsg,
  isAuthFailureNotice,
  normalizeChannel,
  parseIrcLine,
  unescapeTagValue,
  type IrcMessage,
} from "../../src/protocol/ircMessage.js"

const parsed = (line: string): IrcMessage => {
  const message = parseIrcLine(line)
  if (!message) throw new Error(`expected ${line} to parse`)
  return message
}

describe("parseIrcLine", () => {
  it("parses tags, prefix, command and trailing text", () => {
    const message = parsed(
      "@badge-info=;color=#1E90FF;display-name=Some\\sOne;mod=0 :someone!someone@someone.tmi.twitch.tv PRIVMSG #room :hello there: friend",
    )
    expect(message.tags).toEqual({ "badge-info": "", color: "#1E90FF", "display-name": "Some One", mod: "0" })
    expect(message.prefix).toEqual({ nick: "someone", user: "someone", host: "someone.tmi.twitch.tv" })
    expect(message.command).toBe("PRIVMSG")
    expect(message.params).toEqual(["#room", "hello there: friend"])
  })

  it("parses a bare server line", () => {
    expect(parsed("PING :tmi.twitch.tv")).toEqual({
      tags: {},
      prefix: null,
      command: "PING",
      params: ["tmi.twitch.tv"],
    })
  })

  it("keeps middle params and a server prefix", () => {
    const message = parsed(":tmi.twitch.tv CAP * ACK :twitch.tv/tags twitch.tv/commands")
    expect(message.prefix).toEqual({ nick: null, user: null, host: "tmi.twitch.tv" })
    expect(message.params).toEqual(["*", "ACK", "twitch.tv/tags twitch.tv/commands"])
  })

  it("returns null for blank and truncated lines", () => {
    expect(parseIrcLine("")).toBeNull()
    expect(parseIrcLine("   \r\n")).toBeNull()
    expect(parseIrcLine("@only-tags")).toBeNull()
    expect(parseIrcLine(":prefix-only")).toBeNull()
  })
})

describe("unescapeTagValue", () => {
  it("decodes the tag escape sequences", () => {
    expect(unescapeTagValue("a\\sb\\:c\\\\d\\re\\nf")).toBe("a b;c\\d\re\nf")
  })

  it("drops a dangling backslash and keeps unknown escapes literally", () => {
    expect(unescapeTagValue("end\\")).toBe("end")
    expect(unescapeTagValue("\\x")).toBe("x")
  })
})

describe("classifyFrame", () => {
  it("classifies chat with the display name as sender", () => {
    const frame = classifyFrame(parsed("@display-name=Viewer;color=#FF0000 :viewer!viewer@viewer.tmi.twitch.tv PRIVMSG #Room :hi"))
    expect(frame).toEqual({ kind: "chat", channel: "room", sender: "Viewer", body: "hi", color: "#FF0000" })
  })

  it("falls back to the login when there is no display name", () => {
    const frame = classifyFrame(parsed(":viewer!viewer@viewer.tmi.twitch.tv PRIVMSG #room :hey"))
    expect(frame).toEqual({ kind: "chat", channel: "room", sender: "viewer", body: "hey", color: null })
  })

  it("classifies keepalives, notices and reconnect requests", () => {
    expect(classifyFrame(parsed("PING :tmi.twitch.tv"))).toEqual({ kind: "keepalive", direction: "ping", token: "tmi.twitch.tv" })
    expect(classifyFrame(parsed(":tmi.twitch.tv PONG tmi.twitch.tv :tmi.twitch.tv"))).toEqual({
      kind: "keepalive",
      direction: "pong",
      token: "tmi.twitch.tv",
    })
    expect(classifyFrame(parsed("@msg-id=slow_on :tmi.twitch.tv NOTICE #room :Slow mode is on."))).toEqual({
      kind: "notice",
      text: "Slow mode is on.",
      msgId: "slow_on",
    })
    expect(classifyFrame(parsed(":tmi.twitch.tv RECONNECT"))).toEqual({ kind: "reconnect" })
  })

  it("classifies the handshake frames", () => {
    expect(classifyFrame(parsed(":tmi.twitch.tv CAP * ACK :twitch.tv/tags"))).toEqual({ kind: "cap_ack" })
    expect(classifyFrame(parsed(":tmi.twitch.tv CAP * NAK :twitch.tv/tags"))).toEqual({ kind: "other", command: "CAP" })
    expect(classifyFrame(parsed(":tmi.twitch.tv 001 me :Welcome, GLHF!"))).toEqual({ kind: "welcome" })
    expect(classifyFrame(parsed("@display-name=Me;color= :tmi.twitch.tv GLOBALUSERSTATE"))).toEqual({
      kind: "user_state",
      global: true,
      displayName: "Me",
      color: null,
    })
    expect(classifyFrame(parsed(":Me!me@me.tmi.twitch.tv JOIN #room"))).toEqual({ kind: "join", nick: "me", channel: "room" })
    expect(classifyFrame(parsed("@emote-only=0 :tmi.twitch.tv ROOMSTATE #room"))).toEqual({ kind: "room_state", channel: "room" })
    expect(classifyFrame(parsed(":tmi.twitch.tv 353 me = #room :me"))).toEqual({ kind: "other", command: "353" })
  })
})

describe("outbound formatting", () => {
  it("normalizes channels", () => {
    expect(normalizeChannel("  #SomeRoom ")).toBe("someroom")
  })

  it("formats the handshake", () => {
    expect(formatCapabilityRequest()).toBe("CAP REQ :twitch.tv/membership twitch.tv/tags twitch.tv/commands")
    expect(formatPass("oauth:test-secret")).toBe("PASS oauth:test-secret")
    expect(formatPass("test-secret")).toBe("PASS oauth:test-secret")
    expect(formatJoin("#Room")).toBe("JOIN #room")
  })

  it("strips line breaks from chat text", () => {
    expect(formatPrivmsg("room", "one\r\ntwo\nthree ")).toBe("PRIVMSG #room :one two three")
  })

  it("answers an empty ping token with the server host", () => {
    expect(formatPong("")).toBe("PONG :tmi.twitch.tv")
    expect(formatPong("abc")).toBe("PONG :abc")
  })

  it("detects authentication failure notices", () => {
    expect(isAuthFailureNotice("Login authentication failed")).toBe(true)
    expect(isAuthFailureNotice("Improperly formatted auth")).toBe(true)
    expect(isAuthFailureNotice("Slow mode is on.")).toBe(false)
  })
})
