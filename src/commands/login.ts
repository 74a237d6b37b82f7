import { Command, Options } from "@effect/cli"
import { Effect, Option } from "effect"
import { normalizeChannel } from "../protocol/ircMessage.js"
import { getUserConfigPath, loadUserConfigSync, writeUserConfig, type UserConfigFile } from "../config/userConfig.js"

const tokenOption = Options.text("token").pipe(Options.optional)
const nickOption = Options.text("nick").pipe(Options.optional)
const channelOption = Options.text("channel").pipe(Options.optional)
const clearTokenOption = Options.boolean("clear-token").pipe(Options.optional)

const OAUTH_PREFIX = /^oauth:/i

/** Accepts `oauth:abc` or `abc`; stores the bare token. */
export const normalizeToken = (value: string): string => {
  const trimmed = value.trim().replace(OAUTH_PREFIX, "")
  if (!trimmed) {
    throw new Error("Token is empty.")
  }
  if (/\s/.test(trimmed)) {
    throw new Error("Token must not contain whitespace.")
  }
  return trimmed
}

export interface LoginInput {
  readonly token: string | null
  readonly nick: string | null
  readonly channel: string | null
  readonly clearToken: boolean
}

export const mergeLogin = (existing: UserConfigFile, input: LoginInput): UserConfigFile => {
  const channel = input.channel ? normalizeChannel(input.channel) : null
  const base: UserConfigFile = input.clearToken ? { ...existing, authToken: undefined } : existing
  return {
    ...base,
    ...(input.token ? { authToken: normalizeToken(input.token) } : {}),
    ...(input.nick ? { nick: input.nick.trim().toLowerCase() } : {}),
    ...(channel ? { channel } : {}),
  }
}

export const loginCommand = Command.make(
  "login",
  {
    token: tokenOption,
    nick: nickOption,
    channel: channelOption,
    clearToken: clearTokenOption,
  },
  ({ token, nick, channel, clearToken }) =>
    Effect.tryPromise(async () => {
      const existing = loadUserConfigSync()
      const input: LoginInput = {
        token: Option.getOrNull(token),
        nick: Option.getOrNull(nick),
        channel: Option.getOrNull(channel),
        clearToken: Option.match(clearToken, {
          onNone: () => false,
          onSome: (value) => value,
        }),
      }
      let next: UserConfigFile
      try {
        next = mergeLogin(existing, input)
      } catch (error) {
        console.error(`modalchat: ${error instanceof Error ? error.message : String(error)}`)
        process.exitCode = 1
        return
      }
      await writeUserConfig(next)

      const tokenNote = input.token
        ? "Token saved."
        : input.clearToken
          ? "Token cleared."
          : existing.authToken
            ? "Token preserved."
            : "No token configured."
      const channelNote = next.channel ? `Default channel: #${next.channel}` : "No default channel."
      console.log(`Saved chat settings to ${getUserConfigPath()}\n${channelNote}\n${tokenNote}`)
    }),
)
