export interface IrcPrefix {
  readonly nick: string | null
  readonly user: string | null
  readonly host: string
}

export interface IrcMessage {
  readonly tags: Readonly<Record<string, string>>
  readonly prefix: IrcPrefix | null
  readonly command: string
  /** Middle params followed by the trailing param, if any. */
  readonly params: readonly string[]
}

export type InboundFrame =
  | {
      readonly kind: "chat"
      readonly channel: string
      readonly sender: string
      readonly body: string
      readonly color: string | null
    }
  | { readonly kind: "keepalive"; readonly direction: "ping" | "pong"; readonly token: string }
  | { readonly kind: "notice"; readonly text: string; readonly msgId: string | null }
  | { readonly kind: "reconnect" }
  | { readonly kind: "cap_ack" }
  | { readonly kind: "welcome" }
  | { readonly kind: "user_state"; readonly global: boolean; readonly displayName: string | null; readonly color: string | null }
  | { readonly kind: "join"; readonly nick: string | null; readonly channel: string }
  | { readonly kind: "room_state"; readonly channel: string }
  | { readonly kind: "other"; readonly command: string }

export const SERVER_HOST_TOKEN = "tmi.twitch.tv"
export const MAX_MESSAGE_LENGTH = 500
export const REQUESTED_CAPABILITIES = ["twitch.tv/membership", "twitch.tv/tags", "twitch.tv/commands"] as const

const TAG_ESCAPES: Record<string, string> = {
  ":": ";",
  s: " ",
  "\\": "\\",
  r: "\r",
  n: "\n",
}

export const unescapeTagValue = (value: string): string => {
  let result = ""
  for (let index = 0; index < value.length; index += 1) {
    const char = value[index]
    if (char !== "\\") {
      result += char
      continue
    }
    const next = value[index + 1]
    index += 1
    if (next === undefined) break
    result += TAG_ESCAPES[next] ?? next
  }
  return result
}

const parseTags = (raw: string): Record<string, string> => {
  const tags: Record<string, string> = {}
  for (const entry of raw.split(";")) {
    if (!entry) continue
    const separator = entry.indexOf("=")
    if (separator === -1) {
      tags[entry] = ""
      continue
    }
    tags[entry.slice(0, separator)] = unescapeTagValue(entry.slice(separator + 1))
  }
  return tags
}

export const parsePrefix = (raw: string): IrcPrefix => {
  const bang = raw.indexOf("!")
  const at = raw.indexOf("@")
  if (bang !== -1 && at > bang) {
    return { nick: raw.slice(0, bang), user: raw.slice(bang + 1, at), host: raw.slice(at + 1) }
  }
  if (at !== -1) {
    return { nick: raw.slice(0, at), user: null, host: raw.slice(at + 1) }
  }
  // A bare prefix is either a server name or a nick; both are kept as the host.
  return { nick: null, user: null, host: raw }
}

/** Parses one protocol line. Returns null for blank or command-less lines. */
export const parseIrcLine = (line: string): IrcMessage | null => {
  let rest = line.replace(/\r?\n$/, "").replace(/\r$/, "")
  if (!rest.trim()) return null

  let tags: Record<string, string> = {}
  if (rest.startsWith("@")) {
    const space = rest.indexOf(" ")
    if (space === -1) return null
    tags = parseTags(rest.slice(1, space))
    rest = rest.slice(space + 1).trimStart()
  }

  let prefix: IrcPrefix | null = null
  if (rest.startsWith(":")) {
    const space = rest.indexOf(" ")
    if (space === -1) return null
    prefix = parsePrefix(rest.slice(1, space))
    rest = rest.slice(space + 1).trimStart()
  }

  const params: string[] = []
  const trailingIndex = rest.indexOf(" :")
  const head = trailingIndex === -1 ? rest : rest.slice(0, trailingIndex)
  const [command, ...middle] = head.split(" ").filter((part) => part.length > 0)
  if (!command) return null
  params.push(...middle)
  if (trailingIndex !== -1) {
    params.push(rest.slice(trailingIndex + 2))
  }
  return { tags, prefix, command: command.toUpperCase(), params }
}

export const normalizeChannel = (value: string): string => value.trim().replace(/^#/, "").toLowerCase()

const nonEmpty = (value: string | undefined): string | null => (value && value.length > 0 ? value : null)

/** Display name, then login, then nick, then the channel itself. */
export const resolveSender = (message: IrcMessage, channel: string): string =>
  nonEmpty(message.tags["display-name"]) ??
  nonEmpty(message.prefix?.user ?? undefined) ??
  nonEmpty(message.prefix?.nick ?? undefined) ??
  channel

const lastParam = (message: IrcMessage): string => message.params[message.params.length - 1] ?? ""

export const classifyFrame = (message: IrcMessage): InboundFrame => {
  switch (message.command) {
    case "PRIVMSG": {
      const channel = normalizeChannel(message.params[0] ?? "")
      return {
        kind: "chat",
        channel,
        sender: resolveSender(message, channel),
        body: message.params.length > 1 ? lastParam(message) : "",
        color: nonEmpty(message.tags.color),
      }
    }
    case "PING":
      return { kind: "keepalive", direction: "ping", token: lastParam(message) }
    case "PONG":
      return { kind: "keepalive", direction: "pong", token: lastParam(message) }
    case "NOTICE":
      return { kind: "notice", text: lastParam(message), msgId: nonEmpty(message.tags["msg-id"]) }
    case "RECONNECT":
      return { kind: "reconnect" }
    case "CAP":
      return message.params[1]?.toUpperCase() === "ACK" ? { kind: "cap_ack" } : { kind: "other", command: "CAP" }
    case "001":
      return { kind: "welcome" }
    case "GLOBALUSERSTATE":
    case "USERSTATE":
      return {
        kind: "user_state",
        global: message.command === "GLOBALUSERSTATE",
        displayName: nonEmpty(message.tags["display-name"]),
        color: nonEmpty(message.tags.color),
      }
    case "JOIN":
      return {
        kind: "join",
        nick: message.prefix?.nick?.toLowerCase() ?? null,
        channel: normalizeChannel(message.params[0] ?? ""),
      }
    case "ROOMSTATE":
      return { kind: "room_state", channel: normalizeChannel(message.params[0] ?? "") }
    default:
      return { kind: "other", command: message.command }
  }
}

const AUTH_FAILURE_PATTERNS = ["login authentication failed", "improperly formatted auth", "invalid nick"]

export const isAuthFailureNotice = (text: string): boolean => {
  const lowered = text.toLowerCase()
  return AUTH_FAILURE_PATTERNS.some((pattern) => lowered.includes(pattern))
}

export const sanitizeOutbound = (text: string): string => text.replace(/[\r\n]+/g, " ").trim()

const normalizeToken = (token: string): string => token.trim().replace(/^oauth:/i, "")

export const formatCapabilityRequest = (): string => `CAP REQ :${REQUESTED_CAPABILITIES.join(" ")}`
export const formatPass = (token: string): string => `PASS oauth:${normalizeToken(token)}`
export const formatNick = (nick: string): string => `NICK ${nick}`
export const formatJoin = (channel: string): string => `JOIN #${normalizeChannel(channel)}`
export const formatPrivmsg = (channel: string, text: string): string =>
  `PRIVMSG #${normalizeChannel(channel)} :${sanitizeOutbound(text)}`
export const formatPing = (token: string = SERVER_HOST_TOKEN): string => `PING :${token}`
export const formatPong = (token: string = SERVER_HOST_TOKEN): string => `PONG :${token || SERVER_HOST_TOKEN}`
