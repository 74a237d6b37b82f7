import dotenv from "dotenv"
import path from "node:path"
import { DEFAULT_HISTORY_LIMIT } from "../history/chatHistory.js"
import { DEFAULT_BACKOFF } from "../protocol/backoff.js"
import { DEFAULT_MIN_SEND_INTERVAL_MS } from "../protocol/outboundQueue.js"
import {
  DEFAULT_HANDSHAKE_TIMEOUT_MS,
  DEFAULT_LIVENESS_TIMEOUT_MS,
  DEFAULT_PING_GRACE_MS,
} from "../protocol/session.js"
import { loadUserConfigSync } from "./userConfig.js"

dotenv.config()

export interface AppConfig {
  readonly host: string
  readonly port: number
  readonly nick: string | undefined
  readonly channel: string | undefined
  readonly historyLimit: number
  readonly minSendIntervalMs: number
  readonly backoffMinMs: number
  readonly backoffMaxMs: number
  readonly livenessTimeoutMs: number
  readonly pingGraceMs: number
  readonly handshakeTimeoutMs: number
  readonly clipboardSync: boolean
  readonly eventLogPath: string | null
}

export const DEFAULT_HOST = "irc.chat.twitch.tv"
export const DEFAULT_PORT = 6667

const readPositiveInt = (raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim() === "") return fallback
  const parsed = Number(raw)
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback
}

const readFlag = (raw: string | undefined): boolean => {
  const normalized = (raw ?? "").trim().toLowerCase()
  return normalized === "1" || normalized === "true"
}

const resolveEventLogPath = (): string | null => {
  const explicit = process.env.MODALCHAT_EVENT_LOG?.trim()
  if (!explicit) return null
  return path.isAbsolute(explicit) ? explicit : path.join(process.cwd(), explicit)
}

const computeConfig = (): AppConfig => {
  const userConfig = loadUserConfigSync()
  const host = process.env.MODALCHAT_HOST?.trim() || userConfig.host || DEFAULT_HOST
  const port = readPositiveInt(process.env.MODALCHAT_PORT, userConfig.port ?? DEFAULT_PORT)
  const backoffMinMs = readPositiveInt(process.env.MODALCHAT_BACKOFF_MIN_MS, DEFAULT_BACKOFF.minDelayMs)
  return {
    host,
    port: port <= 65_535 ? port : DEFAULT_PORT,
    nick: process.env.MODALCHAT_NICK?.trim() || userConfig.nick,
    channel: process.env.MODALCHAT_CHANNEL?.trim() || userConfig.channel,
    historyLimit: readPositiveInt(process.env.MODALCHAT_HISTORY_LIMIT, userConfig.historyLimit ?? DEFAULT_HISTORY_LIMIT),
    minSendIntervalMs: readPositiveInt(process.env.MODALCHAT_RATE_LIMIT_MS, DEFAULT_MIN_SEND_INTERVAL_MS),
    backoffMinMs,
    backoffMaxMs: Math.max(backoffMinMs, readPositiveInt(process.env.MODALCHAT_BACKOFF_MAX_MS, DEFAULT_BACKOFF.maxDelayMs)),
    livenessTimeoutMs: readPositiveInt(process.env.MODALCHAT_LIVENESS_MS, DEFAULT_LIVENESS_TIMEOUT_MS),
    pingGraceMs: readPositiveInt(process.env.MODALCHAT_PING_GRACE_MS, DEFAULT_PING_GRACE_MS),
    handshakeTimeoutMs: readPositiveInt(process.env.MODALCHAT_HANDSHAKE_TIMEOUT_MS, DEFAULT_HANDSHAKE_TIMEOUT_MS),
    clipboardSync: readFlag(process.env.MODALCHAT_CLIPBOARD),
    eventLogPath: resolveEventLogPath(),
  }
}

export const loadAppConfig = (): AppConfig => computeConfig()
