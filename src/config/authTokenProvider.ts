import { loadUserConfigSync } from "./userConfig.js"

export type TokenSource = "flag" | "env" | "config"

export interface ResolvedToken {
  readonly token: string
  readonly source: TokenSource
}

/** Flag, then `MODALCHAT_TOKEN` / `TWITCH_TOKEN`, then the user config file. */
export const resolveAuthToken = (flagValue?: string | null): ResolvedToken | null => {
  const flagToken = flagValue?.trim()
  if (flagToken) return { token: flagToken, source: "flag" }

  const envToken = process.env.MODALCHAT_TOKEN?.trim() || process.env.TWITCH_TOKEN?.trim()
  if (envToken) return { token: envToken, source: "env" }

  const fileToken = loadUserConfigSync().authToken?.trim()
  if (fileToken) return { token: fileToken, source: "config" }

  return null
}
