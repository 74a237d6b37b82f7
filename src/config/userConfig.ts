import { homedir } from "node:os"
import path from "node:path"
import fs from "node:fs"
import { promises as fsp } from "node:fs"

export interface UserConfigFile {
  readonly host?: string
  readonly port?: number
  readonly authToken?: string
  readonly nick?: string
  readonly channel?: string
  readonly historyLimit?: number
}

const resolveConfigPath = (): string => {
  const explicit = process.env.MODALCHAT_USER_CONFIG?.trim()
  if (explicit) {
    return path.resolve(explicit)
  }
  return path.join(homedir(), ".modalchat", "config.json")
}

export const getUserConfigPath = (): string => resolveConfigPath()

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)

const stringField = (value: unknown): string | undefined =>
  typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined

const positiveIntField = (value: unknown): number | undefined =>
  typeof value === "number" && Number.isInteger(value) && value > 0 ? value : undefined

export const loadUserConfigSync = (): UserConfigFile => {
  const configPath = resolveConfigPath()
  try {
    if (!fs.existsSync(configPath)) return {}
    const raw = fs.readFileSync(configPath, "utf8")
    const parsed: unknown = JSON.parse(raw)
    if (!isRecord(parsed)) return {}
    return {
      host: stringField(parsed.host),
      port: positiveIntField(parsed.port),
      authToken: stringField(parsed.authToken),
      nick: stringField(parsed.nick),
      channel: stringField(parsed.channel),
      historyLimit: positiveIntField(parsed.historyLimit),
    }
  } catch {
    return {}
  }
}

export const writeUserConfig = async (next: UserConfigFile): Promise<void> => {
  const configPath = resolveConfigPath()
  await fsp.mkdir(path.dirname(configPath), { recursive: true })
  const payload = {
    ...(next.host ? { host: next.host } : {}),
    ...(next.port ? { port: next.port } : {}),
    ...(next.authToken ? { authToken: next.authToken } : {}),
    ...(next.nick ? { nick: next.nick } : {}),
    ...(next.channel ? { channel: next.channel } : {}),
    ...(next.historyLimit ? { historyLimit: next.historyLimit } : {}),
  }
  // The file holds a credential.
  await fsp.writeFile(configPath, JSON.stringify(payload, null, 2), { encoding: "utf8", mode: 0o600 })
}
