import React from "react"
import { Command, Options } from "@effect/cli"
import { Effect, Option } from "effect"
import { render } from "ink"
import type { Instance as InkInstance } from "ink"
import { loadAppConfig, type AppConfig } from "../../config/appConfig.js"
import { resolveAuthToken } from "../../config/authTokenProvider.js"
import { ModalInputMachine } from "../../editor/modalMachine.js"
import { Register } from "../../editor/register.js"
import { TextBuffer } from "../../editor/textBuffer.js"
import { ChatHistory } from "../../history/chatHistory.js"
import { describeError } from "../../protocol/errors.js"
import { ChatSession } from "../../protocol/session.js"
import { createTcpTransportFactory } from "../../protocol/transport.js"
import { ChatView } from "../../repl/components/ChatView.js"
import { mirrorToClipboard } from "../../util/clipboard.js"
import { debugLog } from "../../util/debugLog.js"
import { ChatClientController } from "./controller.js"
import { startEventLog } from "./eventLog.js"

const channelOption = Options.text("channel").pipe(Options.optional)
const tokenOption = Options.text("token").pipe(Options.optional)
const nickOption = Options.text("nick").pipe(Options.optional)
const historyLimitOption = Options.integer("history-limit").pipe(Options.optional)

const getOptionValue = <T,>(value: Option.Option<T>): T | null => Option.getOrNull(value)

interface ChatCommandInput {
  readonly channel: string | null
  readonly token: string | null
  readonly nick: string | null
  readonly historyLimit: number | null
}

export const buildChatSession = (config: AppConfig, input: ChatCommandInput): ChatSession => {
  const channel = input.channel ?? config.channel
  if (!channel) {
    throw new Error("No channel given. Pass --channel or set MODALCHAT_CHANNEL.")
  }
  const resolved = resolveAuthToken(input.token)
  if (!resolved) {
    throw new Error("No access token found. Pass --token, set MODALCHAT_TOKEN, or run `modalchat login`.")
  }
  debugLog("chat", { channel, tokenSource: resolved.source, host: config.host, port: config.port })
  return new ChatSession({
    channel,
    token: resolved.token,
    nick: input.nick ?? config.nick,
    transportFactory: createTcpTransportFactory({ host: config.host, port: config.port }),
    minSendIntervalMs: config.minSendIntervalMs,
    backoff: { minDelayMs: config.backoffMinMs, maxDelayMs: config.backoffMaxMs },
    livenessTimeoutMs: config.livenessTimeoutMs,
    pingGraceMs: config.pingGraceMs,
    handshakeTimeoutMs: config.handshakeTimeoutMs,
  })
}

const runInteractive = async (controller: ChatClientController) => {
  let ink: InkInstance | null = null

  const handleKeys = controller.handleKeys.bind(controller)

  const rerender = () => {
    if (!ink) return
    ink.rerender(<ChatView state={controller.getState()} onKeys={handleKeys} />)
  }

  const unsubscribe = controller.onChange(() => rerender())
  const resizeHandler = () => rerender()
  if (process.stdout?.isTTY) {
    process.stdout.on("resize", resizeHandler)
  }

  ink = render(<ChatView state={controller.getState()} onKeys={handleKeys} />, { exitOnCtrlC: false })

  const sigintHandler = async () => {
    await controller.stop()
  }
  process.once("SIGINT", sigintHandler)

  try {
    await controller.untilStopped()
  } finally {
    process.off("SIGINT", sigintHandler)
    if (process.stdout?.isTTY) {
      process.stdout.off("resize", resizeHandler)
    }
    unsubscribe()
    ink?.unmount()
  }
}

export const chatCommand = Command.make(
  "chat",
  {
    channel: channelOption,
    token: tokenOption,
    nick: nickOption,
    historyLimit: historyLimitOption,
  },
  ({ channel, token, nick, historyLimit }) =>
    Effect.tryPromise(async () => {
      const config = loadAppConfig()
      const input: ChatCommandInput = {
        channel: getOptionValue(channel),
        token: getOptionValue(token),
        nick: getOptionValue(nick),
        historyLimit: getOptionValue(historyLimit),
      }
      let session: ChatSession
      let history: ChatHistory
      try {
        session = buildChatSession(config, input)
        history = new ChatHistory(input.historyLimit ?? config.historyLimit)
      } catch (error) {
        console.error(`modalchat: ${describeError(error)}`)
        process.exitCode = 1
        return
      }
      const register = new Register(config.clipboardSync ? mirrorToClipboard : undefined)
      const controller = new ChatClientController({
        session,
        history,
        machine: new ModalInputMachine({ buffer: new TextBuffer(), register }),
      })
      const eventLog = await startEventLog(session, config.eventLogPath)

      controller.start().catch((error: unknown) => {
        debugLog("chat", { startError: String(error) })
        void controller.stop()
      })

      try {
        await runInteractive(controller)
        await controller.stop()
      } finally {
        await eventLog.stop().catch(() => undefined)
      }
    }),
)
